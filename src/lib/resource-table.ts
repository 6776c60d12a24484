/**
 * @module root.lib.resourceTable
 */
import { z } from 'zod';
import { ArgumentError } from '../errors';
import { RpcValue } from '../types';
import _resourceData from './resources.json';

/**
 * The kinds of resources managed through the remote service.
 */
export const RESOURCE_KINDS = [
    'mailbox',
    'email',
    'domain',
    'website',
    'application',
    'cron',
    'dns',
    'database',
    'file',
    'shellUser',
    'server',
    'system'
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/**
 * Types of values that operation parameters can take.
 */
export const PARAMETER_TYPES = [
    'string',
    'boolean',
    'integer',
    'string[]',
    'array'
] as const;

export type ParameterType = (typeof PARAMETER_TYPES)[number];

/**
 * Schema of any value that can be sent to the remote service.
 */
export const rpcValueSchema: z.ZodType<RpcValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.date(),
        z.array(rpcValueSchema),
        z.record(rpcValueSchema)
    ])
);

const _parameterSchema = z
    .object({
        name: z.string().min(1),
        type: z.enum(PARAMETER_TYPES),
        default: rpcValueSchema.optional(),
        join: z.string().optional(),
        spread: z.boolean().optional()
    })
    .strict();

const _guardSchema = z
    .object({
        list: z.string().min(1),
        keys: z.array(z.string().min(1)).min(1),
        expect: z.enum(['absent', 'present']),
        message: z.string().min(1)
    })
    .strict();

const _operationSchema = z
    .object({
        method: z.string().min(1),
        params: z.array(_parameterSchema),
        guard: _guardSchema.optional()
    })
    .strict();

const _resourceSchema = z
    .object({
        lists: z.array(z.string().min(1)),
        operations: z.record(_operationSchema)
    })
    .strict();

const _tableSchema = z
    .object({
        mailbox: _resourceSchema,
        email: _resourceSchema,
        domain: _resourceSchema,
        website: _resourceSchema,
        application: _resourceSchema,
        cron: _resourceSchema,
        dns: _resourceSchema,
        database: _resourceSchema,
        file: _resourceSchema,
        shellUser: _resourceSchema,
        server: _resourceSchema,
        system: _resourceSchema
    })
    .strict();

/**
 * A single positional parameter of a remote procedure.
 */
export type IParameterDefinition = z.infer<typeof _parameterSchema>;

/**
 * Describes the existence check performed before an operation is sent to
 * the remote service.
 */
export type IGuardDefinition = z.infer<typeof _guardSchema>;

/**
 * A remote operation on a resource, with the arguments it takes in the order
 * that the remote procedure expects them.
 */
export interface IOperationDefinition {
    kind: ResourceKind;
    name: string;

    /**
     * Name of the remote procedure.
     */
    method: string;

    /**
     * Label under which results of the operation are logged.
     */
    label: string;

    params: IParameterDefinition[];
    guard?: IGuardDefinition;

    /**
     * Validates the named arguments of the operation.
     */
    schema: z.ZodType<{ [name: string]: RpcValue | undefined }>;
}

/**
 * All list procedures and operations of a resource kind.
 */
export interface IResourceDefinition {
    kind: ResourceKind;
    lists: string[];
    operations: Map<string, IOperationDefinition>;
}

/**
 * Lookup of resource definitions by kind.
 */
export type ResourceTable = Map<ResourceKind, IResourceDefinition>;

/**
 * Formats validation issues as a single line of text.
 */
export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => {
            const path = issue.path.join('.');
            return path ? `${path}: ${issue.message}` : issue.message;
        })
        .join('; ');
}

function _getValueSchema(type: ParameterType): z.ZodType<RpcValue> {
    switch (type) {
        case 'string':
            return z.string();
        case 'boolean':
            return z.boolean();
        case 'integer':
            return z.number().int();
        case 'string[]':
            return z.array(z.string());
        case 'array':
            return z.array(rpcValueSchema);
    }
}

function _buildOperation(
    kind: ResourceKind,
    name: string,
    data: z.infer<typeof _operationSchema>
): IOperationDefinition {
    const where = `${kind}.${name}`;
    const shape: { [name: string]: z.ZodType<RpcValue | undefined> } = {};

    data.params.forEach((param, index) => {
        if (shape[param.name]) {
            throw new Error(`${where}: duplicate parameter '${param.name}'`);
        }
        const valueSchema = _getValueSchema(param.type);
        if (param.default !== undefined && !valueSchema.safeParse(param.default).success) {
            throw new Error(`${where}: invalid default for '${param.name}'`);
        }
        if (param.join !== undefined && param.type !== 'string[]') {
            throw new Error(`${where}: only string lists can be joined ('${param.name}')`);
        }
        if (param.spread && index !== data.params.length - 1) {
            throw new Error(`${where}: only the last parameter can be spread ('${param.name}')`);
        }
        shape[param.name] =
            param.default === undefined ? valueSchema : valueSchema.optional();
    });

    if (data.guard) {
        data.guard.keys.forEach((key) => {
            if (!shape[key]) {
                throw new Error(`${where}: guard key '${key}' is not a parameter`);
            }
        });
    }

    return {
        kind,
        name,
        method: data.method,
        label: data.method.toUpperCase(),
        params: data.params,
        guard: data.guard,
        schema: z.object(shape).strict()
    };
}

/**
 * Validates a resource table and builds the operation definitions it
 * describes.
 *
 * @param data The raw table.
 *
 * @return The resource definitions, by kind. An error is thrown if the table
 *         is malformed.
 */
export function loadResourceTable(data: unknown): ResourceTable {
    const result = _tableSchema.safeParse(data);
    if (!result.success) {
        throw new Error(`Invalid resource table: ${formatIssues(result.error)}`);
    }

    const table: ResourceTable = new Map();
    RESOURCE_KINDS.forEach((kind) => {
        const resource = result.data[kind];
        const operations = new Map<string, IOperationDefinition>();
        Object.keys(resource.operations).forEach((name) => {
            operations.set(
                name,
                _buildOperation(kind, name, resource.operations[name])
            );
        });
        table.set(kind, {
            kind,
            lists: resource.lists,
            operations
        });
    });
    return table;
}

let _defaultTable: ResourceTable | undefined;

/**
 * Returns the table of resources supported by the remote service. The table
 * is loaded and validated on first use.
 */
export function getResourceTable(): ResourceTable {
    if (!_defaultTable) {
        _defaultTable = loadResourceTable(_resourceData);
    }
    return _defaultTable;
}

/**
 * Returns the definition of a resource kind.
 *
 * @param kind The resource kind.
 * @param table The table to look the kind up in.
 */
export function getResource(
    kind: ResourceKind,
    table: ResourceTable = getResourceTable()
): IResourceDefinition {
    const resource = table.get(kind);
    if (!resource) {
        throw new ArgumentError(`Unknown resource kind '${kind}'`);
    }
    return resource;
}

/**
 * Determines if a string names a resource kind.
 */
export function isResourceKind(value: string): value is ResourceKind {
    return RESOURCE_KINDS.some((kind) => kind === value);
}

/**
 * Validates the named arguments of an operation and lays them out in the
 * order that the remote procedure expects. Omitted arguments take their
 * defaults, joined parameters are collapsed into a single string, and spread
 * parameters are appended item by item.
 *
 * @param operation The operation to prepare arguments for.
 * @param args Named arguments.
 *
 * @return The positional arguments. An [[ArgumentError]] is thrown if the
 *         arguments do not match the operation.
 */
export function orderArguments(
    operation: IOperationDefinition,
    args: unknown
): RpcValue[] {
    const result = operation.schema.safeParse(args === undefined ? {} : args);
    if (!result.success) {
        throw new ArgumentError(
            `${operation.label}: ${formatIssues(result.error)}`
        );
    }

    const positional: RpcValue[] = [];
    operation.params.forEach((param) => {
        let value = result.data[param.name];
        if (value === undefined) {
            value = param.default;
        }
        if (value === undefined) {
            throw new ArgumentError(
                `${operation.label}: missing argument '${param.name}'`
            );
        }
        if (param.join !== undefined && Array.isArray(value)) {
            value = value.map(String).join(param.join);
        }
        if (param.spread && Array.isArray(value)) {
            positional.push(...value);
        } else {
            positional.push(value);
        }
    });
    return positional;
}

/**
 * Extracts the values of the named fields from a set of arguments, to be used
 * as the candidate of an existence check.
 *
 * @param keys The fields to extract.
 * @param args Validated named arguments.
 */
export function pickCandidate(
    keys: ReadonlyArray<string>,
    args: { [name: string]: RpcValue | undefined }
): { [name: string]: RpcValue } {
    const candidate: { [name: string]: RpcValue } = {};
    keys.forEach((key) => {
        const value = args[key];
        if (value !== undefined) {
            candidate[key] = value;
        }
    });
    return candidate;
}
