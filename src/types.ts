/**
 * @module root
 */
import Listr from 'listr';

/**
 * A scalar value that can travel over the remote procedure call protocol.
 */
export type RpcScalar = string | number | boolean | null | Date;

/**
 * Any value that can be sent to, or received from the remote service.
 */
export type RpcValue = RpcScalar | RpcValue[] | IRpcRecord;

/**
 * A mapping of field names to values, such as a single entry returned by one
 * of the remote list procedures.
 */
export interface IRpcRecord {
    [field: string]: RpcValue;
}

/**
 * The two outcomes that a logged call can have. The order of this list is
 * the order in which result buckets are created and reported.
 */
export const RUN_STATUSES = ['success', 'failure'] as const;

/**
 * Status tag of a logged call.
 */
export type RunStatus = (typeof RUN_STATUSES)[number];

/**
 * The outcome of a single attempted operation.
 */
export interface IRunResult {
    /**
     * The time at which the result was logged.
     */
    timestamp: Date;

    /**
     * The label of the operation, typically the upper cased name of the
     * remote procedure.
     */
    label: string;

    /**
     * Status of the operation.
     */
    status: RunStatus;

    /**
     * The value returned by the remote service on success, or a description
     * of the error on failure.
     */
    payload: RpcValue | undefined;
}

/**
 * Read only view of the results accumulated over a session, partitioned by
 * status.
 */
export type RunLog = ReadonlyMap<RunStatus, ReadonlyArray<Readonly<IRunResult>>>;

/**
 * Account information returned by the remote service on login.
 */
export interface IAccountInfo extends IRpcRecord {
    /**
     * The name of the user that logged in.
     */
    username: string;
}

/**
 * An authenticated session against the remote service.
 */
export interface ISession {
    /**
     * Token that has to be passed as the first argument of every call.
     */
    readonly token: string;

    /**
     * Account details returned by the login call.
     */
    readonly account: Readonly<IAccountInfo>;
}

/**
 * Credentials used to open a session.
 */
export interface ICredentials {
    /**
     * The control panel username.
     */
    username: string;

    /**
     * The control panel password.
     */
    password: string;

    /**
     * Name of the machine to log in to. Only needed for accounts that span
     * more than one machine.
     */
    machine?: string;

    /**
     * Version of the remote API to use. Has to be provided along with the
     * machine name.
     */
    apiVersion?: number;
}

/**
 * A single entry of a rendered report.
 */
export interface IReportEntry {
    status: RunStatus;
    label: string;
    timestamp: Date;

    /**
     * Flattened text rendering of the payload.
     */
    text: string;
}

/**
 * A format agnostic report, with one entry per logged result.
 */
export interface IReportDocument {
    title: string;
    entries: IReportEntry[];
}

/**
 * A task definition for a command. This conforms to the task required by
 * [Listr](https://github.com/SamVerschueren/listr).
 */
export interface ITaskDefinition<TContext> {
    /**
     * The task title.
     */
    title: string;

    /**
     * The task definition in the form of a function.
     */
    task: (ctx: TContext) => Promise<void> | Listr<TContext>;

    /**
     * Optional check that determines if the task should run at all.
     */
    enabled?: (ctx: TContext) => boolean;
}
