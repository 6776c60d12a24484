/**
 * @module root.lib.runLedger
 */
import _loggerProvider from '@vamship/logger';
import { FIELD_SEPARATOR } from '../consts';
import {
    ArgumentError,
    FaultError,
    getErrorMessage,
    TransportError
} from '../errors';
import {
    IRunResult,
    ISession,
    RUN_STATUSES,
    RunLog,
    RunStatus,
    RpcValue
} from '../types';
import { IRemoteTransport } from './transport';

/**
 * Options for the ledger.
 */
export interface IRunLedgerOptions {
    /**
     * Clock used to timestamp results. Defaults to the system clock.
     */
    now?: () => Date;
}

/**
 * Describes a failed call in the form that is logged in the failure bucket.
 *
 * @param error The error raised by the call.
 */
export function describeFailure(error: unknown): string {
    if (error instanceof FaultError) {
        return [error.faultCode, error.faultString].join(FIELD_SEPARATOR);
    }
    if (error instanceof TransportError) {
        return [error.url, error.code, error.message].join(FIELD_SEPARATOR);
    }
    if (error instanceof ArgumentError) {
        return `Invalid arguments: ${error.message}`;
    }
    return getErrorMessage(error);
}

/**
 * Performs calls against the remote service on behalf of an authenticated
 * session, and keeps a log of the outcome of every call. Failed calls are
 * recorded and never raised, so that a long list of operations can run to
 * completion past individual failures.
 */
export class RunLedger {
    private _transport: IRemoteTransport;
    private _session: ISession;
    private _now: () => Date;
    private _results: Map<RunStatus, IRunResult[]>;
    private _logger = _loggerProvider.getLogger('run-ledger');

    /**
     * @param transport The transport to send calls over.
     * @param session The authenticated session to make calls on behalf of.
     * @param options Ledger options.
     */
    constructor(
        transport: IRemoteTransport,
        session: ISession,
        options: IRunLedgerOptions = {}
    ) {
        this._transport = transport;
        this._session = session;
        this._now = options.now || (() => new Date());
        this._results = new Map();
        RUN_STATUSES.forEach((status) => this._results.set(status, []));
    }

    /**
     * The session that calls are made on behalf of.
     */
    public get session(): ISession {
        return this._session;
    }

    /**
     * The transport used to make calls.
     */
    public get transport(): IRemoteTransport {
        return this._transport;
    }

    /**
     * All results logged so far, by status. The success bucket always comes
     * first.
     */
    public get results(): RunLog {
        return this._results;
    }

    /**
     * Number of results logged per status.
     */
    public get counts(): Record<RunStatus, number> {
        return {
            success: this.getResults('success').length,
            failure: this.getResults('failure').length
        };
    }

    /**
     * Returns the results logged with the given status, in the order in which
     * they were logged.
     *
     * @param status The status to filter by.
     */
    public getResults(status: RunStatus): ReadonlyArray<Readonly<IRunResult>> {
        return this._bucket(status);
    }

    /**
     * Appends a result to the log.
     *
     * @param label Label of the operation.
     * @param status Outcome of the operation.
     * @param payload The value returned by the operation, or a description of
     *        the failure.
     */
    public log(label: string, status: RunStatus, payload: RpcValue | undefined): void {
        this._bucket(status).push({
            timestamp: this._now(),
            label,
            status,
            payload
        });
        if (status === 'failure') {
            this._logger.warn({ label, payload }, 'Operation failed');
        } else {
            this._logger.debug({ label }, 'Operation succeeded');
        }
    }

    /**
     * Calls a remote procedure with the session token followed by the given
     * arguments, and logs the outcome. The returned promise is never rejected.
     *
     * @param label Label of the operation.
     * @param method Name of the remote procedure.
     * @param args Arguments, in the order that the remote procedure expects.
     */
    public async invoke(label: string, method: string, args: RpcValue[]): Promise<void> {
        let result: RpcValue;
        try {
            result = await this.fetch(method, args);
        } catch (ex) {
            this.log(label, 'failure', describeFailure(ex));
            return;
        }
        this.log(label, 'success', result);
    }

    /**
     * Calls a remote procedure on behalf of the session without logging the
     * outcome. Intended for read only calls whose failures are handled by the
     * caller.
     *
     * @param method Name of the remote procedure.
     * @param args Arguments that follow the session token.
     */
    public fetch(method: string, args: RpcValue[] = []): Promise<RpcValue> {
        this._logger.trace({ method }, 'Dispatching call');
        return this._transport.call(method, [this._session.token, ...args]);
    }

    private _bucket(status: RunStatus): IRunResult[] {
        let bucket = this._results.get(status);
        if (!bucket) {
            bucket = [];
            this._results.set(status, bucket);
        }
        return bucket;
    }
}
