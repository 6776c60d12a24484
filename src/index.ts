/**
 * @module root
 */
export * from './types';
export * from './errors';
export { API_URL, STANDARD_EMAIL_PREFIXES } from './consts';
export { getConfig } from './config';
export type { IConfig } from './config';
export { countMatches, exists, flatten, isRecord } from './lib/existence-checker';
export type { IFlattenOptions } from './lib/existence-checker';
export { classifyError, XmlRpcTransport } from './lib/transport';
export type { IRemoteTransport, IXmlRpcTransportOptions } from './lib/transport';
export { login } from './lib/session';
export { describeFailure, RunLedger } from './lib/run-ledger';
export type { IRunLedgerOptions } from './lib/run-ledger';
export { escapeHtml, render, renderPayload, toHtml } from './lib/report-renderer';
export type { IReportOptions } from './lib/report-renderer';
export {
    getResource,
    getResourceTable,
    loadResourceTable,
    orderArguments,
    RESOURCE_KINDS
} from './lib/resource-table';
export type {
    IGuardDefinition,
    IOperationDefinition,
    IParameterDefinition,
    IResourceDefinition,
    ResourceKind,
    ResourceTable
} from './lib/resource-table';
export { ManagedResource } from './lib/managed-resource';
export type { IOperationArgs } from './lib/managed-resource';
export { ApiClient } from './lib/api-client';
export type {
    IApiClientOptions,
    ICreateEmailsArgs,
    IDeleteEmailsArgs
} from './lib/api-client';
export { parseScript, readScript, runStep } from './lib/script';
export type { IScript, IScriptStep } from './lib/script';
export { writeReport } from './lib/report-writer';
export type { IReportFile, IReportWriterOptions } from './lib/report-writer';
