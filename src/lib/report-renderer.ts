/**
 * @module root.lib.reportRenderer
 */
import {
    EMPTY_RESULT_TEXT,
    FIELD_SEPARATOR,
    LINE_SEPARATOR,
    REPORT_STYLES,
    REPORT_TITLE
} from '../consts';
import {
    IReportDocument,
    IReportEntry,
    RpcScalar,
    RpcValue,
    RunLog
} from '../types';
import { flatten, isRecord } from './existence-checker';

/**
 * Options that control the appearance of the report.
 */
export interface IReportOptions {
    /**
     * Title of the report. Defaults to [[REPORT_TITLE]].
     */
    title?: string;

    /**
     * Stylesheet embedded in the HTML report. Defaults to [[REPORT_STYLES]].
     */
    styles?: string;
}

function _scalarText(value: RpcScalar): string {
    if (value instanceof Date) {
        return value.toISOString();
    }
    return String(value);
}

/**
 * Renders the payload of a logged result as a single line of text.
 *
 * @param payload The payload to render.
 */
export function renderPayload(payload: RpcValue | undefined): string {
    if (payload === undefined || payload === null || payload === '') {
        return EMPTY_RESULT_TEXT;
    }
    if (Array.isArray(payload) || isRecord(payload)) {
        const leaves = flatten(payload);
        if (leaves.length === 0) {
            return EMPTY_RESULT_TEXT;
        }
        return leaves
            .map((leaf) => `'${_scalarText(leaf)}'`)
            .join(FIELD_SEPARATOR);
    }
    return _scalarText(payload);
}

/**
 * Converts a run log into a report with one entry per logged result. Entries
 * follow bucket order, and insertion order within each bucket. The log is
 * not modified.
 *
 * @param log The log to render.
 * @param options Report options.
 */
export function render(log: RunLog, options: IReportOptions = {}): IReportDocument {
    const entries: IReportEntry[] = [];
    log.forEach((results, status) => {
        results.forEach(({ timestamp, label, payload }) => {
            entries.push({
                status,
                label,
                timestamp,
                text: renderPayload(payload)
            });
        });
    });

    return {
        title: options.title || REPORT_TITLE,
        entries
    };
}

const _htmlEntities: { [char: string]: string } = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

/**
 * Escapes text for inclusion in an HTML document.
 */
export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, (char) => _htmlEntities[char] || char);
}

/**
 * Formats a report entry as a single line of text.
 *
 * @param entry The entry to format.
 */
export function formatEntry(entry: IReportEntry): string {
    return [entry.timestamp.toISOString(), entry.label, entry.text].join(
        LINE_SEPARATOR
    );
}

/**
 * Serializes a report as an HTML page, with one list item per entry whose
 * class is the status of the entry.
 *
 * @param document The report to serialize.
 * @param options Report options. Only the stylesheet is used; the title is
 *        taken from the document.
 */
export function toHtml(document: IReportDocument, options: IReportOptions = {}): string {
    const title = escapeHtml(document.title);
    const items = document.entries.map(
        (entry) =>
            `      <li class="${entry.status}">${escapeHtml(formatEntry(entry))}</li>`
    );

    return [
        '<!DOCTYPE html>',
        '<html>',
        '  <head>',
        `    <title>${title}</title>`,
        '    <style>',
        options.styles === undefined ? REPORT_STYLES : options.styles,
        '    </style>',
        '  </head>',
        '  <body>',
        `    <h1>${title}</h1>`,
        '    <ul id="results">',
        ...items,
        '    </ul>',
        '  </body>',
        '</html>',
        ''
    ].join('\n');
}
