#!/usr/bin/env node

import _loggerProvider from '@vamship/logger';
import _path from 'path';
import _yargs from 'yargs';
import { getConfig } from '../config';
import { APP_NAME } from '../consts';

_loggerProvider.configure(APP_NAME, {
    level: getConfig().logLevel,
    destination: 'process.stderr',
    extreme: false
});
const _logger = _loggerProvider.getLogger('main');

_logger.trace('Logger initialized');

_yargs
    .usage('Usage $0 <command> <options>')
    .commandDir('../commands', {
        // Matches .ts when run from sources, .js once built
        extensions: [_path.extname(__filename).slice(1)]
    })
    .demandCommand()
    .help()
    .wrap(_yargs.terminalWidth())
    .parseAsync()
    .then(
        (argv) => {
            _logger.trace('Input arguments', argv);
        },
        (err) => {
            _logger.error(err, 'Command failed');
            process.exitCode = 1;
        }
    );
