/**
 * @file Value Tree Type Definitions
 *
 * Closed tagged union for the loosely-typed documents the pipeline reads:
 * pipeline configuration and state specifications. Consumers switch on
 * `kind` and the compiler checks that every variant is handled.
 *
 * @module tree
 */

// ─── Value Variants ──────────────────────────────────────────────

export interface StringValue {
    kind: 'string';
    value: string;
}

export interface NumberValue {
    kind: 'number';
    value: number;
}

export interface BoolValue {
    kind: 'bool';
    value: boolean;
}

export interface NullValue {
    kind: 'null';
}

export interface ListValue {
    kind: 'list';
    items: ConfigValue[];
}

/**
 * Map node. Entries keep document order.
 */
export interface MapValue {
    kind: 'map';
    entries: Map<string, ConfigValue>;
}

export type ConfigValue =
    | StringValue
    | NumberValue
    | BoolValue
    | NullValue
    | ListValue
    | MapValue;

export type ScalarValue = StringValue | NumberValue | BoolValue | NullValue;

/** Plain JavaScript form of a value tree (what `JSON.parse` would give). */
export type PlainValue =
    | string
    | number
    | boolean
    | null
    | PlainValue[]
    | { [key: string]: PlainValue };

// ─── Constructors ────────────────────────────────────────────────

export function str(value: string): StringValue {
    return { kind: 'string', value };
}

export function num(value: number): NumberValue {
    return { kind: 'number', value };
}

export function bool(value: boolean): BoolValue {
    return { kind: 'bool', value };
}

export const NULL_VALUE: NullValue = { kind: 'null' };

export function list(items: ConfigValue[] = []): ListValue {
    return { kind: 'list', items };
}

export function map(entries: Iterable<[string, ConfigValue]> = []): MapValue {
    return { kind: 'map', entries: new Map(entries) };
}
