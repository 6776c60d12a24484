/**
 * @module root.lib.apiClient
 */
import _loggerProvider from '@vamship/logger';
import { API_URL, STANDARD_EMAIL_PREFIXES } from '../consts';
import { IAccountInfo, ICredentials, IReportDocument } from '../types';
import { ManagedResource } from './managed-resource';
import { IReportOptions, render, toHtml } from './report-renderer';
import {
    getResource,
    getResourceTable,
    ResourceKind,
    ResourceTable
} from './resource-table';
import { IRunLedgerOptions, RunLedger } from './run-ledger';
import { login } from './session';
import { IRemoteTransport, XmlRpcTransport } from './transport';

/**
 * Options for opening a client.
 */
export interface IApiClientOptions extends IRunLedgerOptions {
    /**
     * Endpoint of the remote service. Defaults to [[API_URL]]. Ignored when a
     * transport is provided.
     */
    url?: string;

    /**
     * Milliseconds to wait for each response. Ignored when a transport is
     * provided.
     */
    timeout?: number;

    /**
     * Transport to use instead of an XML-RPC connection to the endpoint.
     */
    transport?: IRemoteTransport;

    /**
     * Resource table to use instead of the built in one.
     */
    resources?: ResourceTable;
}

/**
 * Arguments for creating a set of addresses on a domain.
 */
export interface ICreateEmailsArgs {
    domain: string;

    /**
     * Mailbox prefixes. Defaults to [[STANDARD_EMAIL_PREFIXES]].
     */
    prefixes?: ReadonlyArray<string>;

    /**
     * Mailboxes or addresses that mail is delivered to.
     */
    targets: string[];
}

/**
 * Arguments for deleting a set of addresses on a domain.
 */
export interface IDeleteEmailsArgs {
    domain: string;

    /**
     * Mailbox prefixes. Defaults to [[STANDARD_EMAIL_PREFIXES]].
     */
    prefixes?: ReadonlyArray<string>;
}

/**
 * Client for the remote administrative API. Gives access to every resource
 * kind through a shared ledger, and produces a report of everything that was
 * attempted.
 */
export class ApiClient {
    /**
     * Logs in to the remote service and returns a client for the session.
     *
     * @param credentials The account credentials.
     * @param options Client options.
     *
     * @return A client bound to the new session. The promise is rejected with
     *         a [[LoginError]] if the login fails.
     */
    public static async login(
        credentials: ICredentials,
        options: IApiClientOptions = {}
    ): Promise<ApiClient> {
        const transport =
            options.transport ||
            new XmlRpcTransport(options.url || API_URL, {
                timeout: options.timeout
            });
        const session = await login(transport, credentials);
        const ledger = new RunLedger(transport, session, { now: options.now });
        return new ApiClient(ledger, options.resources);
    }

    private _ledger: RunLedger;
    private _table: ResourceTable;
    private _resources: Map<ResourceKind, ManagedResource>;
    private _logger = _loggerProvider.getLogger('api-client');

    /**
     * @param ledger Ledger bound to an authenticated session.
     * @param table The resources available to the client.
     */
    constructor(ledger: RunLedger, table: ResourceTable = getResourceTable()) {
        this._ledger = ledger;
        this._table = table;
        this._resources = new Map();
    }

    /**
     * The ledger that records the outcome of every operation.
     */
    public get ledger(): RunLedger {
        return this._ledger;
    }

    /**
     * Details of the logged in account.
     */
    public get account(): Readonly<IAccountInfo> {
        return this._ledger.session.account;
    }

    /**
     * Returns the object that manages resources of the given kind.
     *
     * @param kind The resource kind.
     */
    public resource(kind: ResourceKind): ManagedResource {
        let resource = this._resources.get(kind);
        if (!resource) {
            resource = new ManagedResource(
                this._ledger,
                getResource(kind, this._table)
            );
            this._resources.set(kind, resource);
        }
        return resource;
    }

    /**
     * Creates one address per prefix on a domain, all delivering to the same
     * targets. Addresses that already exist are reported as failures and
     * skipped.
     */
    public async createEmails(args: ICreateEmailsArgs): Promise<void> {
        const { domain, targets } = args;
        const prefixes = args.prefixes || STANDARD_EMAIL_PREFIXES;
        this._logger.debug({ domain, count: prefixes.length }, 'Creating emails');
        for (const prefix of prefixes) {
            await this.resource('email').execute('create', {
                email_address: `${prefix}@${domain}`,
                targets
            });
        }
    }

    /**
     * Deletes one address per prefix on a domain.
     */
    public async deleteEmails(args: IDeleteEmailsArgs): Promise<void> {
        const { domain } = args;
        const prefixes = args.prefixes || STANDARD_EMAIL_PREFIXES;
        this._logger.debug({ domain, count: prefixes.length }, 'Deleting emails');
        for (const prefix of prefixes) {
            await this.resource('email').execute('delete', {
                email_address: `${prefix}@${domain}`
            });
        }
    }

    /**
     * Renders the results recorded so far.
     *
     * @param options Report options.
     */
    public getReport(options: IReportOptions = {}): IReportDocument {
        return render(this._ledger.results, options);
    }

    /**
     * Renders the results recorded so far as an HTML page.
     *
     * @param options Report options.
     */
    public report(options: IReportOptions = {}): string {
        return toHtml(this.getReport(options), options);
    }
}
