/**
 * @module root.tasks.login
 */
import _loggerProvider from '@vamship/logger';
import { ApiClient, IApiClientOptions } from '../lib/api-client';
import { ICredentials, ITaskDefinition } from '../types';
import { IRunContext } from './types';

/**
 * Returns a task that logs in to the remote service and stores the client on
 * the run context.
 *
 * @param credentials The account credentials.
 * @param options Client options.
 *
 * @return ITaskDefinition A task definition that can be used to execute the
 *         task.
 */
export const getTask = (
    credentials: ICredentials,
    options: IApiClientOptions = {}
): ITaskDefinition<IRunContext> => {
    return {
        title: `Log in as ${credentials.username}`,
        task: async (ctx) => {
            const logger = _loggerProvider.getLogger('login');
            logger.debug({ username: credentials.username }, 'Logging in');
            const client = await ApiClient.login(credentials, options);
            const { username, web_server: webServer } = client.account;
            logger.info(
                { username, webServer },
                'Logged in to the API server'
            );
            ctx.client = client;
        }
    };
};
