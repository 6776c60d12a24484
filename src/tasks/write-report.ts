/**
 * @module root.tasks.writeReport
 */
import _loggerProvider from '@vamship/logger';
import { writeReport } from '../lib/report-writer';
import { ITaskDefinition } from '../types';
import { getClient, IRunContext } from './types';

/**
 * Returns a task that appends the HTML report of the run to a file.
 *
 * @param reportFile Path to the report file.
 *
 * @return ITaskDefinition A task definition that can be used to execute the
 *         task.
 */
export const getTask = (reportFile: string): ITaskDefinition<IRunContext> => {
    return {
        title: 'Write run report',
        enabled: (ctx) => ctx.client !== undefined,
        task: async (ctx) => {
            const logger = _loggerProvider.getLogger('write-report');
            const client = getClient(ctx);
            await writeReport(reportFile, client.report());
            logger.debug(client.ledger.counts, 'Report written');
        }
    };
};
