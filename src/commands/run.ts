/**
 * @module root.commands.run
 */
import _loggerProvider from '@vamship/logger';
import Listr from 'listr';
import _path from 'path';
import { ArgumentsCamelCase, Options } from 'yargs';
import { getConfig } from '../config';
import { IApiClientOptions } from '../lib/api-client';
import { getTask as _getLoginTask } from '../tasks/login';
import { getTask as _getRunScriptTask } from '../tasks/run-script';
import { IRunContext } from '../tasks/types';
import { getTask as _getWriteReportTask } from '../tasks/write-report';
import { ICredentials, ITaskDefinition } from '../types';

/**
 * Arguments accepted by the run command.
 */
export interface IRunArgs {
    username: string;
    password: string;
    scriptFile?: string;
    reportFile?: string;
    apiUrl?: string;
    timeout?: number;
    machine?: string;
    apiVersion?: number;
}

export const command = 'run';
export const describe =
    'Log in, optionally run a script of operations, and report the results';
export const builder: { [key: string]: Options } = {
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
    'script-file': {
        alias: 's',
        describe: 'Path to a JSON file of operations to perform',
        type: 'string',
        default: undefined
    },
    'report-file': {
        alias: 'r',
        describe: 'Path to the file that the HTML run report is appended to',
        type: 'string',
        default: undefined
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
    },
    machine: {
        alias: 'm',
        describe: 'The machine to log in to, for accounts with several machines',
        type: 'string',
        default: undefined
    },
    'api-version': {
        describe: 'The API version to use. Only sent along with a machine',
        type: 'number',
        default: undefined
    }
};

/**
 * Returns the list of tasks performed by the command.
 *
 * @param args The command arguments.
 * @param options Client options, merged over those derived from the
 *        arguments and the environment.
 */
export const getTasks = (
    args: IRunArgs,
    options: IApiClientOptions = {}
): ITaskDefinition<IRunContext>[] => {
    const config = getConfig();
    const credentials: ICredentials = {
        username: args.username,
        password: args.password,
        machine: args.machine,
        apiVersion: args.apiVersion
    };
    const clientOptions: IApiClientOptions = {
        url: args.apiUrl || config.apiUrl,
        timeout: args.timeout === undefined ? config.timeout : args.timeout,
        ...options
    };

    const tasks = [_getLoginTask(credentials, clientOptions)];
    if (args.scriptFile) {
        tasks.push(_getRunScriptTask(_path.normalize(args.scriptFile)));
    }
    if (args.reportFile) {
        tasks.push(_getWriteReportTask(_path.normalize(args.reportFile)));
    }
    return tasks;
};

export const handler = async (argv: ArgumentsCamelCase<IRunArgs>): Promise<void> => {
    const logger = _loggerProvider.getLogger('run');
    const ctx = await new Listr<IRunContext>(getTasks(argv), {
        exitOnError: false
    }).run({});

    if (ctx.client) {
        logger.info(ctx.client.ledger.counts, 'Run complete');
    }
};
