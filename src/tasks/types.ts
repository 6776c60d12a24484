/**
 * @module root.tasks
 */
import { ApiClient } from '../lib/api-client';
import { IScript } from '../lib/script';

/**
 * State shared by the tasks of a run.
 */
export interface IRunContext {
    /**
     * Client for the session, set once login succeeds.
     */
    client?: ApiClient;

    /**
     * The script to run, set once it has been read.
     */
    script?: IScript;
}

/**
 * Returns the logged in client of a run.
 *
 * @param ctx The run context.
 */
export function getClient(ctx: IRunContext): ApiClient {
    if (!ctx.client) {
        throw new Error('Not logged in');
    }
    return ctx.client;
}
