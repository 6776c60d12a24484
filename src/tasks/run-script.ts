/**
 * @module root.tasks.runScript
 */
import _loggerProvider from '@vamship/logger';
import Listr from 'listr';
import { describeStep, readScript, runStep } from '../lib/script';
import { ITaskDefinition } from '../types';
import { getClient, IRunContext } from './types';

/**
 * Returns a task that reads a script file and performs its steps one after
 * the other. Failed operations are recorded on the ledger and do not stop
 * the remaining steps.
 *
 * @param scriptFile Path to the script file.
 *
 * @return ITaskDefinition A task definition that can be used to execute the
 *         task.
 */
export const getTask = (scriptFile: string): ITaskDefinition<IRunContext> => {
    return {
        title: 'Run script',
        enabled: (ctx) => ctx.client !== undefined,
        task: () => {
            const logger = _loggerProvider.getLogger('run-script');
            return new Listr<IRunContext>([
                {
                    title: 'Read script file',
                    task: async (ctx) => {
                        ctx.script = await readScript(scriptFile);
                        logger.debug(
                            { steps: ctx.script.steps.length },
                            'Script file read'
                        );
                    }
                },
                {
                    title: 'Perform script steps',
                    task: (ctx) => {
                        const client = getClient(ctx);
                        const steps = ctx.script ? ctx.script.steps : [];
                        return new Listr<IRunContext>(
                            steps.map((step) => ({
                                title: describeStep(step),
                                task: async () => {
                                    await runStep(client, step);
                                    logger.trace(client.ledger.counts);
                                }
                            }))
                        );
                    }
                }
            ]);
        }
    };
};
