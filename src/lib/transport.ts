/**
 * @module root.lib.transport
 */
import _loggerProvider from '@vamship/logger';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import _xmlrpc from 'xmlrpc';
import { ArgumentError, FaultError, getErrorMessage, TransportError } from '../errors';
import { IRpcRecord, RpcValue } from '../types';

/**
 * A connection to the remote procedure call endpoint.
 */
export interface IRemoteTransport {
    /**
     * The endpoint that calls are sent to.
     */
    readonly url: string;

    /**
     * Calls a remote procedure. Implementations reject with a
     * [[FaultError]] when the remote service signals an error, with a
     * [[TransportError]] on network or protocol failures, and with an
     * [[ArgumentError]] when the parameters cannot be sent.
     *
     * @param method Name of the remote procedure.
     * @param params Positional parameters.
     */
    call(method: string, params: RpcValue[]): Promise<RpcValue>;
}

/**
 * Options for the XML-RPC transport.
 */
export interface IXmlRpcTransportOptions {
    /**
     * Milliseconds to wait for a response before giving up. Waits
     * indefinitely when omitted.
     */
    timeout?: number;
}

/**
 * Converts a deserialized response into an [[RpcValue]]. Binary values are
 * returned as base64 encoded strings.
 */
export function toRpcValue(value: unknown): RpcValue {
    if (value === undefined || value === null) {
        return null;
    }
    if (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean' ||
        value instanceof Date
    ) {
        return value;
    }
    if (Buffer.isBuffer(value)) {
        return value.toString('base64');
    }
    if (Array.isArray(value)) {
        return value.map(toRpcValue);
    }
    if (typeof value === 'object') {
        const record: IRpcRecord = {};
        for (const [field, item] of Object.entries(value)) {
            record[field] = toRpcValue(item);
        }
        return record;
    }
    return String(value);
}

/**
 * Maps an error reported by the XML-RPC client to one of the error types of
 * this library.
 *
 * @param url The endpoint the call was made against.
 * @param error The error reported by the client.
 */
export function classifyError(url: string, error: unknown): Error {
    if (typeof error !== 'object' || error === null) {
        return new TransportError(url, 'UNKNOWN', String(error));
    }
    if ('faultCode' in error && typeof error.faultCode === 'number') {
        const faultString =
            'faultString' in error && typeof error.faultString === 'string'
                ? error.faultString
                : getErrorMessage(error);
        return new FaultError(error.faultCode, faultString);
    }

    let code: string | number = 'UNKNOWN';
    if (
        'res' in error &&
        typeof error.res === 'object' &&
        error.res !== null &&
        'statusCode' in error.res &&
        typeof error.res.statusCode === 'number'
    ) {
        code = error.res.statusCode;
    } else if ('code' in error && typeof error.code === 'string') {
        code = error.code;
    }
    return new TransportError(url, code, getErrorMessage(error), error);
}

interface IConnection {
    agent: HttpAgent;
    client: _xmlrpc.Client;
}

// Each connection owns its agent, so that the sockets of a call that timed
// out can be destroyed.
function _connect(url: string): IConnection {
    const endpoint = new URL(url);
    const isSecure = endpoint.protocol === 'https:';
    const agent = isSecure ? new HttpsAgent() : new HttpAgent();
    const options: _xmlrpc.Client['options'] & { agent: HttpAgent } = {
        host: endpoint.hostname,
        port: endpoint.port ? Number(endpoint.port) : undefined,
        path: `${endpoint.pathname}${endpoint.search}`,
        agent
    };
    return {
        agent,
        client: isSecure
            ? _xmlrpc.createSecureClient(options)
            : _xmlrpc.createClient(options)
    };
}

/**
 * Transport that talks XML-RPC over http(s). A call that times out has its
 * connection torn down, and later calls open a new one.
 */
export class XmlRpcTransport implements IRemoteTransport {
    private _url: string;
    private _connection: IConnection;
    private _timeout?: number;
    private _logger = _loggerProvider.getLogger('transport');

    /**
     * @param url The endpoint of the remote service.
     * @param options Transport options.
     */
    constructor(url: string, options: IXmlRpcTransportOptions = {}) {
        this._url = url;
        this._timeout = options.timeout;
        this._connection = _connect(url);
    }

    public get url(): string {
        return this._url;
    }

    public call(method: string, params: RpcValue[]): Promise<RpcValue> {
        this._logger.trace({ method }, 'Calling remote procedure');
        const { agent, client } = this._connection;
        return new Promise<RpcValue>((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined;
            let settled = false;
            const settle = (error: Error | undefined, value?: RpcValue) => {
                if (settled) {
                    return;
                }
                settled = true;
                if (timer) {
                    clearTimeout(timer);
                }
                if (error) {
                    this._logger.debug({ method, error }, 'Remote call failed');
                    reject(error);
                } else {
                    resolve(value === undefined ? null : value);
                }
            };

            if (this._timeout !== undefined) {
                const timeout = this._timeout;
                timer = setTimeout(() => {
                    agent.destroy();
                    this._connection = _connect(this._url);
                    settle(
                        new TransportError(
                            this._url,
                            'ETIMEDOUT',
                            `No response after ${timeout}ms`
                        )
                    );
                }, timeout);
            }

            try {
                client.methodCall(method, params, (error, value) => {
                    if (error) {
                        settle(classifyError(this._url, error));
                    } else {
                        settle(undefined, toRpcValue(value));
                    }
                });
            } catch (ex) {
                settle(new ArgumentError(getErrorMessage(ex)));
            }
        });
    }
}
