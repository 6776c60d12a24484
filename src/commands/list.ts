/**
 * @module root.commands.list
 */
import _loggerProvider from '@vamship/logger';
import { ArgumentsCamelCase, Options } from 'yargs';
import { getConfig } from '../config';
import { ArgumentError } from '../errors';
import { ApiClient, IApiClientOptions } from '../lib/api-client';
import { isResourceKind, RESOURCE_KINDS } from '../lib/resource-table';
import { RpcValue } from '../types';

/**
 * Arguments accepted by the list command.
 */
export interface IListArgs {
    resource: string;
    method?: string;
    username: string;
    password: string;
    apiUrl?: string;
    timeout?: number;
}

export const command = 'list <resource>';
export const describe = 'Print a list of resources as JSON';
export const builder: { [key: string]: Options } = {
    method: {
        describe: [
            'The list procedure to call.',
            'Defaults to the first list procedure of the resource'
        ].join(' '),
        type: 'string',
        default: undefined
    },
    username: {
        alias: 'u',
        describe: 'The control panel username',
        type: 'string',
        demand: true
    },
    password: {
        alias: 'p',
        describe: 'The control panel password',
        type: 'string',
        demand: true
    },
    'api-url': {
        describe: [
            'The endpoint of the API.',
            'Defaults to the WF_API_URL environment variable, or the public endpoint'
        ].join(' '),
        type: 'string',
        default: undefined
    },
    timeout: {
        alias: 't',
        describe: 'Milliseconds to wait for each API response',
        type: 'number',
        default: undefined
    }
};

/**
 * Logs in and fetches a list of resources.
 *
 * @param args The command arguments.
 * @param options Client options, merged over those derived from the
 *        arguments and the environment.
 */
export const fetchList = async (
    args: IListArgs,
    options: IApiClientOptions = {}
): Promise<RpcValue[]> => {
    const { resource, method, username, password } = args;
    if (!isResourceKind(resource)) {
        throw new ArgumentError(
            `Unknown resource '${resource}'. Expected one of: ${RESOURCE_KINDS.join(', ')}`
        );
    }

    const config = getConfig();
    const client = await ApiClient.login(
        { username, password },
        {
            url: args.apiUrl || config.apiUrl,
            timeout: args.timeout === undefined ? config.timeout : args.timeout,
            ...options
        }
    );
    return client.resource(resource).list(method);
};

export const handler = async (argv: ArgumentsCamelCase<IListArgs>): Promise<void> => {
    const logger = _loggerProvider.getLogger('list');
    const items = await fetchList(argv);
    logger.debug({ count: items.length }, 'List fetched');
    process.stdout.write(`${JSON.stringify(items, null, 2)}\n`);
};
