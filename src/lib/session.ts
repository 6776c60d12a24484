/**
 * @module root.lib.session
 */
import _loggerProvider from '@vamship/logger';
import { z } from 'zod';
import { getErrorMessage, LoginError } from '../errors';
import { ICredentials, ISession, RpcValue } from '../types';
import { formatIssues, rpcValueSchema } from './resource-table';
import { IRemoteTransport } from './transport';

const _loginResponseSchema = z.tuple([
    z.string().min(1),
    z.object({ username: z.string() }).catchall(rpcValueSchema)
]);

/**
 * Opens a session against the remote service. The session token returned by
 * the service is required by every subsequent call.
 *
 * @param transport The transport to log in over.
 * @param credentials The account credentials.
 *
 * @return The authenticated session. The promise is rejected with a
 *         [[LoginError]] if the service refuses the credentials or returns
 *         an unexpected response.
 */
export async function login(
    transport: IRemoteTransport,
    credentials: ICredentials
): Promise<ISession> {
    const logger = _loggerProvider.getLogger('session');
    const { username, password, machine, apiVersion } = credentials;

    const params: RpcValue[] = [username, password];
    if (machine !== undefined) {
        params.push(machine);
        if (apiVersion !== undefined) {
            params.push(apiVersion);
        }
    }

    logger.debug({ username, url: transport.url }, 'Logging in');
    let response: RpcValue;
    try {
        response = await transport.call('login', params);
    } catch (ex) {
        const err = new LoginError(
            `Unable to log in as '${username}': ${getErrorMessage(ex)}`,
            ex
        );
        logger.error(err);
        throw err;
    }

    const result = _loginResponseSchema.safeParse(response);
    if (!result.success) {
        const err = new LoginError(
            `Unexpected login response received for '${username}': ${formatIssues(
                result.error
            )}`
        );
        logger.error(err);
        throw err;
    }

    const [token, account] = result.data;
    const session: ISession = { token, account };
    logger.debug({ username: session.account.username }, 'Logged in');
    return session;
}
