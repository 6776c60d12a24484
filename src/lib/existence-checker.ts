/**
 * @module root.lib.existenceChecker
 */
import { ArgumentError } from '../errors';
import { IRpcRecord, RpcScalar, RpcValue } from '../types';

/**
 * Options that control how strings are treated when flattening.
 */
export interface IFlattenOptions {
    /**
     * When provided, strings are split into words on this separator.
     */
    separator?: string;

    /**
     * When set along with a separator, words are further split into
     * individual characters.
     */
    splitWords?: boolean;
}

/**
 * Determines if a value is a mapping (as opposed to a scalar or a list).
 */
export function isRecord(value: RpcValue | undefined): value is IRpcRecord {
    return (
        typeof value === 'object' &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Date)
    );
}

function* _walk(value: RpcValue, options: IFlattenOptions): Generator<RpcScalar> {
    if (Array.isArray(value)) {
        for (const item of value) {
            yield* _walk(item, options);
        }
    } else if (isRecord(value)) {
        // Values only. Field names take no part in the result.
        for (const field of Object.keys(value)) {
            yield* _walk(value[field], options);
        }
    } else if (typeof value === 'string' && options.separator !== undefined) {
        for (const word of value.split(options.separator)) {
            if (options.splitWords) {
                yield* word.split('');
            } else {
                yield word;
            }
        }
    } else {
        yield value;
    }
}

/**
 * Reduces an arbitrarily nested value to the list of scalar values at its
 * leaves, in depth first order.
 *
 * @param value The value to flatten.
 * @param options Optional string splitting behavior. Strings are treated as
 *        atomic when omitted.
 */
export function flatten(value: RpcValue, options: IFlattenOptions = {}): RpcScalar[] {
    return Array.from(_walk(value, options));
}

// Dates are compared by time value, everything else by identity of the
// primitive. The type prefix keeps 1 and '1' apart.
function _toKey(value: RpcScalar): string {
    if (value instanceof Date) {
        return `date:${value.getTime()}`;
    }
    return `${value === null ? 'null' : typeof value}:${String(value)}`;
}

function _toKeySet(value: RpcValue): Set<string> {
    return new Set(flatten(value).map(_toKey));
}

/**
 * Counts the records of a collection that contain every leaf value of the
 * candidate.
 *
 * @param candidate A non empty partial record to look for.
 * @param collection The records returned by a remote list call.
 */
export function countMatches(
    candidate: IRpcRecord,
    collection: ReadonlyArray<RpcValue>
): number {
    if (!isRecord(candidate)) {
        throw new ArgumentError('Candidate must be a record');
    }
    const wanted = _toKeySet(candidate);
    if (wanted.size === 0) {
        throw new ArgumentError('Candidate must contain at least one value');
    }

    let matches = 0;
    for (const record of collection) {
        const available = _toKeySet(record);
        let isMatch = true;
        for (const key of wanted) {
            if (!available.has(key)) {
                isMatch = false;
                break;
            }
        }
        if (isMatch) {
            matches++;
        }
    }
    return matches;
}

/**
 * Checks whether exactly one record in the collection matches the candidate.
 * Duplicate matches are reported as not existing; use
 * [[countMatches]] to tell the two cases apart.
 *
 * @param candidate A non empty partial record to look for.
 * @param collection The records returned by a remote list call.
 */
export function exists(
    candidate: IRpcRecord,
    collection: ReadonlyArray<RpcValue>
): boolean {
    return countMatches(candidate, collection) === 1;
}
