/**
 * @module root.lib.reportWriter
 */
import _loggerProvider from '@vamship/logger';
import { open } from 'fs/promises';
import { getErrorMessage, ReportError } from '../errors';

/**
 * An open report file.
 */
export interface IReportFile {
    writeFile(data: string, encoding: 'utf8'): Promise<void>;
    close(): Promise<void>;
}

/**
 * Options for writing a report.
 */
export interface IReportWriterOptions {
    /**
     * Opens the report file for appending. Defaults to opening it on the
     * local file system.
     */
    openFile?: (path: string) => Promise<IReportFile>;
}

const _openForAppend = (path: string): Promise<IReportFile> => open(path, 'a');

/**
 * Appends a report to a file, creating the file if it does not exist.
 *
 * @param path Path to the report file.
 * @param contents The report.
 * @param options Writer options.
 *
 * @return A promise that is rejected with a [[ReportError]] if the report
 *         could not be written, or the file could not be closed.
 */
export async function writeReport(
    path: string,
    contents: string,
    options: IReportWriterOptions = {}
): Promise<void> {
    const logger = _loggerProvider.getLogger('report-writer');
    const openFile = options.openFile || _openForAppend;
    logger.debug({ path }, 'Writing report');

    let file: IReportFile | undefined;
    try {
        file = await openFile(path);
        await file.writeFile(contents, 'utf8');
    } catch (ex) {
        throw new ReportError(
            `Unable to write report file '${path}': ${getErrorMessage(ex)}`,
            ex
        );
    } finally {
        if (file) {
            await _close(file, path);
        }
    }
    logger.debug({ path }, 'Report written');
}

async function _close(file: IReportFile, path: string): Promise<void> {
    try {
        await file.close();
    } catch (ex) {
        throw new ReportError(
            `Unable to close report file '${path}': ${getErrorMessage(ex)}`,
            ex
        );
    }
}
