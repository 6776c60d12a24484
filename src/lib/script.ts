/**
 * @module root.lib.script
 */
import _loggerProvider from '@vamship/logger';
import { promises as _fs } from 'fs';
import { z } from 'zod';
import { getErrorMessage, ScriptError } from '../errors';
import { ApiClient } from './api-client';
import { formatIssues, RESOURCE_KINDS, rpcValueSchema } from './resource-table';

const _operationStepSchema = z
    .object({
        title: z.string().min(1).optional(),
        resource: z.enum(RESOURCE_KINDS),
        operation: z.string().min(1),
        args: z.record(rpcValueSchema).default({})
    })
    .strict();

const _createEmailsStepSchema = z
    .object({
        title: z.string().min(1).optional(),
        batch: z.literal('createEmails'),
        args: z
            .object({
                domain: z.string().min(1),
                prefixes: z.array(z.string().min(1)).optional(),
                targets: z.array(z.string())
            })
            .strict()
    })
    .strict();

const _deleteEmailsStepSchema = z
    .object({
        title: z.string().min(1).optional(),
        batch: z.literal('deleteEmails'),
        args: z
            .object({
                domain: z.string().min(1),
                prefixes: z.array(z.string().min(1)).optional()
            })
            .strict()
    })
    .strict();

const _scriptSchema = z
    .object({
        steps: z.array(
            z.union([
                _operationStepSchema,
                _createEmailsStepSchema,
                _deleteEmailsStepSchema
            ])
        )
    })
    .strict();

/**
 * A script: an ordered list of operations to perform.
 */
export type IScript = z.infer<typeof _scriptSchema>;

/**
 * A single step of a script.
 */
export type IScriptStep = IScript['steps'][number];

/**
 * Validates the contents of a script.
 *
 * @param data The parsed script.
 *
 * @return The validated script. A [[ScriptError]] is thrown if the script is
 *         malformed.
 */
export function parseScript(data: unknown): IScript {
    const result = _scriptSchema.safeParse(data);
    if (!result.success) {
        throw new ScriptError(`Invalid script: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Reads and validates a script file. Scripts are JSON documents of the form
 * `{ "steps": [ { "resource": "mailbox", "operation": "create", "args": { ... } } ] }`.
 *
 * @param path Path to the script file.
 */
export async function readScript(path: string): Promise<IScript> {
    const logger = _loggerProvider.getLogger('script');
    logger.debug({ path }, 'Reading script');

    let contents: string;
    try {
        contents = await _fs.readFile(path, 'utf8');
    } catch (ex) {
        throw new ScriptError(
            `Unable to read script file '${path}': ${getErrorMessage(ex)}`,
            ex
        );
    }

    let data: unknown;
    try {
        data = JSON.parse(contents);
    } catch (ex) {
        throw new ScriptError(
            `Script file '${path}' is not valid JSON: ${getErrorMessage(ex)}`,
            ex
        );
    }

    const script = parseScript(data);
    logger.debug({ path, steps: script.steps.length }, 'Script loaded');
    return script;
}

/**
 * Returns a short human readable description of a step.
 */
export function describeStep(step: IScriptStep): string {
    if (step.title) {
        return step.title;
    }
    if ('resource' in step) {
        return `${step.resource}: ${step.operation}`;
    }
    return `email: ${step.batch} (${step.args.domain})`;
}

/**
 * Performs a single step of a script. Operation failures are recorded on the
 * client's ledger, so the returned promise is not rejected for them.
 *
 * @param client The client to perform the step with.
 * @param step The step to perform.
 */
export async function runStep(client: ApiClient, step: IScriptStep): Promise<void> {
    if ('resource' in step) {
        await client.resource(step.resource).execute(step.operation, step.args);
    } else if (step.batch === 'createEmails') {
        await client.createEmails(step.args);
    } else {
        await client.deleteEmails(step.args);
    }
}
