import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { condition_evaluate, operand_resolve, value_isTruthy } from './evaluator.js';

describe('condition_evaluate', (): void => {
    it('evaluates literal compound conditions', (): void => {
        expect(condition_evaluate('3 > 2 && 1 == 1', {})).toBe(true);
        expect(condition_evaluate("'a' == 'b' || 2 >= 2", {})).toBe(true);
        expect(condition_evaluate("'a' == 'b' || 2 > 2", {})).toBe(false);
        expect(condition_evaluate('1 == 1 && 2 < 1', {})).toBe(false);
    });

    it('treats a missing dotted reference as falsy', (): void => {
        expect(condition_evaluate('missing.key', {})).toBe(false);
        expect(condition_evaluate('missing.key != 3', {})).toBe(true);
    });

    it('compares a missing dotted reference equal to null', (): void => {
        expect(condition_evaluate('user.name == null', {})).toBe(true);
        expect(condition_evaluate('user.name != null', {})).toBe(false);
        expect(condition_evaluate('null == user.name', {})).toBe(true);
        expect(condition_evaluate('user.name == user.nickname', {})).toBe(true);
        expect(condition_evaluate('user.name != null', { 'user.name': 'Sam' })).toBe(true);
        expect(condition_evaluate('user.name == 0', {})).toBe(false);
    });

    it('looks up flat dotted keys and nested maps', (): void => {
        const values = {
            'user.streak': 5,
            'user.name': 'Sam',
            task: { current: 'walk', done: false },
        };
        expect(condition_evaluate('user.streak >= 3', values)).toBe(true);
        expect(condition_evaluate("user.name == 'Sam'", values)).toBe(true);
        expect(condition_evaluate('task.current == walk', values)).toBe(true);
        expect(condition_evaluate('task.done', values)).toBe(false);
        expect(condition_evaluate('task.done == false', values)).toBe(true);
    });

    it('compares numerically when both sides are numbers', (): void => {
        expect(condition_evaluate('user.level == 2.0', { 'user.level': '2' })).toBe(true);
        expect(condition_evaluate('user.level > 10', { 'user.level': '9' })).toBe(false);
        expect(condition_evaluate('user.level <= 9', { 'user.level': 9 })).toBe(true);
    });

    it('fails closed on ordering comparisons of non-numbers', (): void => {
        expect(condition_evaluate("user.name > 'A'", { 'user.name': 'Sam' })).toBe(false);
        expect(condition_evaluate('user.name < 3', { 'user.name': 'Sam' })).toBe(false);
    });

    it('ignores operators inside quoted literals', (): void => {
        expect(condition_evaluate("user.mood == 'a && b'", { 'user.mood': 'a && b' })).toBe(true);
        expect(condition_evaluate('user.mood == "x || y"', { 'user.mood': 'x || y' })).toBe(true);
        expect(condition_evaluate("user.op == '>='", { 'user.op': '>=' })).toBe(true);
    });

    it('checks != before == and >= before >', (): void => {
        expect(condition_evaluate('user.count != 4', { 'user.count': 4 })).toBe(false);
        expect(condition_evaluate('user.count >= 4', { 'user.count': 4 })).toBe(true);
    });

    it('never throws on malformed input', (): void => {
        fc.assert(
            fc.property(fc.string(), (expression: string): void => {
                expect(typeof condition_evaluate(expression, { 'user.x': 1 })).toBe('boolean');
            }),
        );
    });
});

describe('operand_resolve', (): void => {
    it('parses literals', (): void => {
        expect(operand_resolve('null', {})).toBeNull();
        expect(operand_resolve(' true ', {})).toBe(true);
        expect(operand_resolve('"hi"', {})).toBe('hi');
        expect(operand_resolve('42', {})).toBe(42);
        expect(operand_resolve('-1.5', {})).toBe(-1.5);
        expect(operand_resolve('opaque', {})).toBe('opaque');
    });

    it('prefers a variable over a literal of the same spelling', (): void => {
        expect(operand_resolve('ready', { ready: false })).toBe(false);
    });
});

describe('value_isTruthy', (): void => {
    it('follows the falsy table', (): void => {
        for (const falsy of [null, undefined, false, 0, '', [], {}]) {
            expect(value_isTruthy(falsy)).toBe(false);
        }
        for (const truthy of [true, 1, -1, 'x', [0], { a: 1 }]) {
            expect(value_isTruthy(truthy)).toBe(true);
        }
    });
});
