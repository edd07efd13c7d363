/**
 * @file Value Tree Conversions
 *
 * Moves between the tagged value tree and plain JavaScript values, and
 * looks values up by dotted path.
 *
 * @module tree
 */

import { StructuralError } from '../core/errors.js';
import {
    bool,
    list,
    map,
    num,
    str,
    NULL_VALUE,
    type ConfigValue,
    type PlainValue,
} from './types.js';

/**
 * Convert a value tree into plain JavaScript values.
 */
export function tree_toPlain(value: ConfigValue): PlainValue {
    switch (value.kind) {
        case 'string':
        case 'number':
        case 'bool':
            return value.value;
        case 'null':
            return null;
        case 'list':
            return value.items.map((item: ConfigValue): PlainValue => tree_toPlain(item));
        case 'map':
            return Object.fromEntries(
                Array.from(value.entries, ([key, item]: [string, ConfigValue]): [string, PlainValue] => [key, tree_toPlain(item)]),
            );
        default: {
            const unreachable: never = value;
            return unreachable;
        }
    }
}

/**
 * Convert a plain JavaScript value (typically from `JSON.parse`) into a
 * value tree.
 *
 * @throws {StructuralError} On values JSON cannot express
 */
export function tree_fromPlain(value: unknown): ConfigValue {
    if (value === null) return NULL_VALUE;
    if (typeof value === 'string') return str(value);
    if (typeof value === 'number') return num(value);
    if (typeof value === 'boolean') return bool(value);
    if (Array.isArray(value)) {
        return list(value.map((item: unknown): ConfigValue => tree_fromPlain(item)));
    }
    if (typeof value === 'object') {
        return map(
            Object.entries(value).map(([key, item]: [string, unknown]): [string, ConfigValue] => [key, tree_fromPlain(item)]),
        );
    }
    throw new StructuralError(`Unsupported value of type ${typeof value}`);
}
