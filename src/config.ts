/**
 * @module root.config
 */
import { z } from 'zod';
import { API_URL } from './consts';
import { formatIssues } from './lib/resource-table';

const _envSchema = z.object({
    WF_API_URL: z.string().url().default(API_URL),
    WF_API_TIMEOUT: z.coerce.number().int().positive().optional(),
    LOG_LEVEL: z
        .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
        .default('error')
});

/**
 * Settings that can be provided through the environment.
 */
export interface IConfig {
    /**
     * Endpoint of the remote service.
     */
    apiUrl: string;

    /**
     * Milliseconds to wait for each response.
     */
    timeout?: number;

    logLevel: string;
}

/**
 * Reads the configuration from environment variables, falling back to
 * defaults for anything that is not set.
 *
 * @param env The environment to read from.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): IConfig {
    const result = _envSchema.safeParse({
        WF_API_URL: env.WF_API_URL || undefined,
        WF_API_TIMEOUT: env.WF_API_TIMEOUT || undefined,
        LOG_LEVEL: env.LOG_LEVEL || undefined
    });
    if (!result.success) {
        throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
    }
    return {
        apiUrl: result.data.WF_API_URL,
        timeout: result.data.WF_API_TIMEOUT,
        logLevel: result.data.LOG_LEVEL
    };
}
