/**
 * @module root.consts
 */

/**
 * Endpoint of the remote administrative API.
 */
export const API_URL = 'https://api.webfaction.com/';

/**
 * Name under which the application configures its loggers.
 */
export const APP_NAME = 'wf-api-client';

/**
 * Separator used when joining lists of values into a single string.
 */
export const FIELD_SEPARATOR = ', ';

/**
 * Separator between the timestamp, label and payload of a report line.
 */
export const LINE_SEPARATOR = ' | ';

/**
 * Text reported for calls that returned nothing.
 */
export const EMPTY_RESULT_TEXT =
    "'API returns empty result for this type of call.'";

/**
 * Default title of the HTML report.
 */
export const REPORT_TITLE = 'WebFaction API Run Results';

/**
 * Default stylesheet of the HTML report.
 */
export const REPORT_STYLES = [
    'ul#results {border: 2px ridge maroon; background-color: #ffffcc; padding: 0.25em 1.5em; margin-left: 0;}',
    'li.success {color: #006400;}',
    'li.failure {color: #dc143c; text-decoration: line-through;}'
].join('\n');

/**
 * Mailbox prefixes used by the batch email helpers when none are provided.
 */
export const STANDARD_EMAIL_PREFIXES: ReadonlyArray<string> = [
    'www',
    'admin',
    'webmaster',
    'postmaster',
    'hostmaster',
    'info',
    'sales',
    'marketing',
    'support',
    'abuse'
];
