/**
 * @file Target List
 *
 * Newline-delimited `sequence:message` entries. `#` starts a comment;
 * blank lines are ignored.
 *
 * @module pipeline
 */

import { StructuralError } from '../core/errors.js';
import { address_parse, type NodeAddress } from '../graph/types.js';

/**
 * @throws {StructuralError} On the first malformed entry
 */
export function targets_parse(text: string): NodeAddress[] {
    const targets: NodeAddress[] = [];
    text.split(/\r?\n/).forEach((raw: string, i: number): void => {
        const hash: number = raw.indexOf('#');
        const line: string = (hash >= 0 ? raw.slice(0, hash) : raw).trim();
        if (line === '') return;

        const address: NodeAddress | null = address_parse(line);
        if (!address) {
            throw new StructuralError(`line ${i + 1}: expected "sequence:message", got "${line}"`);
        }
        targets.push(address);
    });
    return targets;
}
