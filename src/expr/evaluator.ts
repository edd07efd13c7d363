/**
 * @file Routing Condition Evaluator
 *
 * Evaluates the boolean routing conditions attached to conditional-branch
 * nodes against a hypothetical user state.
 *
 * Grammar, lowest precedence first:
 *
 *   expression  := and ( '||' and )*
 *   and         := comparison ( '&&' comparison )*
 *   comparison  := operand ( op operand )?
 *   op          := '>=' | '<=' | '!=' | '==' | '>' | '<'
 *
 * Operators inside single- or double-quoted literals are ignored. The
 * evaluator never throws: malformed tokens are opaque strings and
 * ordering comparisons on non-numbers are false.
 *
 * @module expr
 */

/** State mapping consulted for variable operands. */
export type VariableMap = Readonly<Record<string, unknown>>;

type ComparisonOperator = '>=' | '<=' | '!=' | '==' | '>' | '<';

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['>=', '<=', '!=', '==', '>', '<'];

const VARIABLE_REFERENCE: RegExp = /^[A-Za-z_]\w*(\.[A-Za-z_]\w*)+$/;
const INT_LITERAL: RegExp = /^[-+]?\d+$/;
const FLOAT_LITERAL: RegExp = /^[-+]?(\d+\.\d*|\.\d+|\d+)([eE][-+]?\d+)?$/;

/**
 * Evaluate a routing condition.
 *
 * @param expression - Condition text, e.g. `user.streak >= 3 && user.isNew == false`
 * @param values - Variables visible to the condition (flat dotted keys or nested maps)
 * @returns The condition's truth value
 */
export function condition_evaluate(expression: string, values: VariableMap): boolean {
    const orParts: string[] = operator_split(expression, '||');
    if (orParts.length > 1) {
        return orParts.some((part: string): boolean => condition_evaluate(part, values));
    }

    const andParts: string[] = operator_split(expression, '&&');
    if (andParts.length > 1) {
        return andParts.every((part: string): boolean => condition_evaluate(part, values));
    }

    return comparison_evaluate(expression.trim(), values);
}

/**
 * Resolve one operand: a variable when the token names one, else a literal.
 * Dotted references to absent variables resolve to `undefined`, which
 * compares equal to `null`.
 */
export function operand_resolve(token: string, values: VariableMap): unknown {
    const trimmed: string = token.trim();

    const found: { value: unknown } | null = variable_lookup(trimmed, values);
    if (found) return found.value;
    if (VARIABLE_REFERENCE.test(trimmed)) return undefined;

    return literal_parse(trimmed);
}

/**
 * Truthiness: null, undefined, false, 0, NaN, empty strings and empty
 * collections are falsy.
 */
export function value_isTruthy(value: unknown): boolean {
    if (value === null || value === undefined) return false;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
    if (typeof value === 'string') return value.length > 0;
    if (Array.isArray(value)) return value.length > 0;
    if (value instanceof Map || value instanceof Set) return value.size > 0;
    if (typeof value === 'object') return Object.keys(value).length > 0;
    return true;
}

// ─── Comparison ──────────────────────────────────────────────────

function comparison_evaluate(expression: string, values: VariableMap): boolean {
    for (const operator of COMPARISON_OPERATORS) {
        const at: number = operator_find(expression, operator);
        if (at < 0) continue;

        const left: unknown = operand_resolve(expression.slice(0, at), values);
        const right: unknown = operand_resolve(expression.slice(at + operator.length), values);

        switch (operator) {
            case '==':
                return values_equal(left, right);
            case '!=':
                return !values_equal(left, right);
            default:
                return numbers_compare(left, right, operator);
        }
    }

    return value_isTruthy(operand_resolve(expression, values));
}

/** A missing variable compares as null. */
function values_equal(leftRaw: unknown, rightRaw: unknown): boolean {
    const left: unknown = leftRaw === undefined ? null : leftRaw;
    const right: unknown = rightRaw === undefined ? null : rightRaw;
    if (left === right) return true;

    const leftNum: number | null = number_coerce(left);
    const rightNum: number | null = number_coerce(right);
    if (leftNum !== null && rightNum !== null) return leftNum === rightNum;

    if (left === null || right === null) return false;
    return String(left) === String(right);
}

function numbers_compare(left: unknown, right: unknown, operator: '>=' | '<=' | '>' | '<'): boolean {
    const a: number | null = number_coerce(left);
    const b: number | null = number_coerce(right);
    if (a === null || b === null) return false;

    switch (operator) {
        case '>=': return a >= b;
        case '<=': return a <= b;
        case '>':  return a > b;
        case '<':  return a < b;
    }
}

function number_coerce(value: unknown): number | null {
    if (typeof value === 'number') return Number.isNaN(value) ? null : value;
    if (typeof value === 'string') {
        const s: string = value.trim();
        if (INT_LITERAL.test(s) || FLOAT_LITERAL.test(s)) return Number(s);
    }
    return null;
}

// ─── Operands ────────────────────────────────────────────────────

function variable_lookup(key: string, values: VariableMap): { value: unknown } | null {
    if (key === '') return null;
    if (Object.prototype.hasOwnProperty.call(values, key)) {
        return { value: values[key] };
    }

    // Nested maps: walk the dotted path segment by segment.
    const segments: string[] = key.split('.');
    if (segments.length < 2) return null;

    let current: unknown = values;
    for (const segment of segments) {
        if (current instanceof Map) {
            if (!current.has(segment)) return null;
            current = current.get(segment);
        } else if (current !== null && typeof current === 'object' && !Array.isArray(current)
            && Object.prototype.hasOwnProperty.call(current, segment)) {
            current = Reflect.get(current, segment);
        } else {
            return null;
        }
    }
    return { value: current };
}

function literal_parse(token: string): unknown {
    if (token === 'null') return null;
    if (token === 'true') return true;
    if (token === 'false') return false;
    if (token.length >= 2 && (
        (token.startsWith("'") && token.endsWith("'")) ||
        (token.startsWith('"') && token.endsWith('"'))
    )) {
        return token.slice(1, -1);
    }
    if (INT_LITERAL.test(token)) return Number.parseInt(token, 10);
    if (FLOAT_LITERAL.test(token)) return Number.parseFloat(token);
    return token;
}

// ─── Scanning ────────────────────────────────────────────────────

/**
 * Index of the first occurrence of `operator` outside quotes, or -1.
 */
function operator_find(text: string, operator: string): number {
    let single: boolean = false;
    let double: boolean = false;
    for (let i = 0; i <= text.length - operator.length; i++) {
        const ch: string = text[i];
        if (ch === "'" && !double) single = !single;
        else if (ch === '"' && !single) double = !double;

        if (!single && !double && text.startsWith(operator, i)) return i;
    }
    return -1;
}

/**
 * Split on every occurrence of `operator` outside quotes.
 */
function operator_split(text: string, operator: string): string[] {
    const parts: string[] = [];
    let single: boolean = false;
    let double: boolean = false;
    let start: number = 0;
    for (let i = 0; i <= text.length - operator.length; i++) {
        const ch: string = text[i];
        if (ch === "'" && !double) single = !single;
        else if (ch === '"' && !single) double = !double;

        if (!single && !double && text.startsWith(operator, i)) {
            parts.push(text.slice(start, i));
            start = i + operator.length;
            i += operator.length - 1;
        }
    }
    parts.push(text.slice(start));
    return parts;
}
