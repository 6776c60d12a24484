/**
 * @module root.lib.managedResource
 */
import _loggerProvider from '@vamship/logger';
import { ArgumentError } from '../errors';
import { RpcValue } from '../types';
import { countMatches } from './existence-checker';
import {
    IOperationDefinition,
    IResourceDefinition,
    orderArguments,
    pickCandidate
} from './resource-table';
import { describeFailure, RunLedger } from './run-ledger';

/**
 * Named arguments of an operation.
 */
export interface IOperationArgs {
    [name: string]: RpcValue | undefined;
}

/**
 * Replaces `{name}` placeholders in a message with the matching arguments.
 */
export function formatMessage(template: string, args: IOperationArgs): string {
    return template.replace(/\{(\w+)\}/g, (match: string, name: string) => {
        const value = args[name];
        return value === undefined ? match : String(value);
    });
}

/**
 * A kind of remote resource, such as mailboxes or websites. Lists the
 * resources and performs operations on them, checking before each guarded
 * operation that the resource does (or does not) exist already. All
 * outcomes are recorded on the ledger.
 */
export class ManagedResource {
    private _ledger: RunLedger;
    private _definition: IResourceDefinition;
    private _logger = _loggerProvider.getLogger('managed-resource');

    /**
     * @param ledger The ledger used to make and record calls.
     * @param definition Definition of the resource kind.
     */
    constructor(ledger: RunLedger, definition: IResourceDefinition) {
        this._ledger = ledger;
        this._definition = definition;
    }

    /**
     * The kind of resource managed by this object.
     */
    public get kind(): string {
        return this._definition.kind;
    }

    /**
     * Names of the list procedures available for this resource.
     */
    public get lists(): ReadonlyArray<string> {
        return this._definition.lists;
    }

    /**
     * Names of the operations available for this resource.
     */
    public get operations(): string[] {
        return Array.from(this._definition.operations.keys());
    }

    /**
     * Fetches a list from the remote service. The call is not recorded on the
     * ledger, and errors are passed on to the caller.
     *
     * @param method The list procedure to call. Defaults to the first list
     *        procedure of the resource.
     */
    public async list(method?: string): Promise<RpcValue[]> {
        const lists = this._definition.lists;
        const listMethod = method === undefined ? lists[0] : method;
        if (listMethod === undefined || lists.indexOf(listMethod) < 0) {
            throw new ArgumentError(
                `Resource '${this.kind}' has no list procedure '${
                    listMethod || ''
                }'`
            );
        }
        const result = await this._ledger.fetch(listMethod);
        return Array.isArray(result) ? result : [result];
    }

    /**
     * Performs an operation on the resource. The outcome, including argument
     * errors and failed existence checks, is recorded on the ledger; the
     * returned promise is never rejected.
     *
     * @param name Name of the operation.
     * @param args Named arguments of the operation.
     */
    public async execute(name: string, args: IOperationArgs = {}): Promise<void> {
        const operation = this._definition.operations.get(name);
        if (!operation) {
            this._ledger.log(
                `${this.kind.toUpperCase()}.${name.toUpperCase()}`,
                'failure',
                describeFailure(
                    new ArgumentError(
                        `Resource '${this.kind}' has no operation '${name}'`
                    )
                )
            );
            return;
        }

        let positional: RpcValue[];
        try {
            positional = orderArguments(operation, args);
        } catch (ex) {
            this._ledger.log(operation.label, 'failure', describeFailure(ex));
            return;
        }

        const isAllowed = await this._checkGuard(operation, args);
        if (isAllowed) {
            await this._ledger.invoke(operation.label, operation.method, positional);
        }
    }

    private async _checkGuard(
        operation: IOperationDefinition,
        args: IOperationArgs
    ): Promise<boolean> {
        const { guard, label } = operation;
        if (!guard) {
            return true;
        }

        let collection: RpcValue;
        try {
            collection = await this._ledger.fetch(guard.list);
        } catch (ex) {
            this._ledger.log(
                label,
                'failure',
                `Unable to verify ${this.kind} before ${label}: ${describeFailure(ex)}`
            );
            return false;
        }

        const candidate = pickCandidate(guard.keys, args);
        let matches: number;
        try {
            matches = countMatches(
                candidate,
                Array.isArray(collection) ? collection : [collection]
            );
        } catch (ex) {
            this._ledger.log(label, 'failure', describeFailure(ex));
            return false;
        }

        this._logger.trace({ label, candidate, matches }, 'Existence check');
        if (matches > 1) {
            this._logger.warn(
                { label, candidate, matches },
                'Ambiguous existence check, treating as not existing'
            );
        }

        const doesExist = matches === 1;
        const isAllowed = guard.expect === 'absent' ? !doesExist : doesExist;
        if (!isAllowed) {
            this._ledger.log(label, 'failure', formatMessage(guard.message, args));
        }
        return isAllowed;
    }
}
