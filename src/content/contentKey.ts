/**
 * @file Content Key Codec
 *
 * Maps dotted content identifiers (`actor.action.subject[.modifier]*`)
 * to corpus addresses and back. The address decides where accepted
 * lines are appended, so the mapping is exact:
 *
 *   bot.acknowledge.completion.positive
 *     → content/bot/acknowledge/completion_positive.txt
 *
 * Addresses are relative; callers resolve them under the assets root.
 *
 * @module content
 */

import { StructuralError } from '../core/errors.js';

export interface ValidContentKey {
    valid: true;
    raw: string;
    actor: string;
    action: string;
    subject: string;
    modifiers: string[];
}

export interface InvalidContentKey {
    valid: false;
    raw: string;
    reason: string;
}

export type DecodedContentKey = ValidContentKey | InvalidContentKey;

const CORPUS_ROOT: string = 'content';
const FORBIDDEN_SEGMENT: RegExp = /[/\\\s]|^\.+$/;

/**
 * Decode a dotted content key. Fewer than three segments, or any empty
 * or path-like segment, yields an invalid key.
 */
export function contentKey_decode(raw: string): DecodedContentKey {
    const parts: string[] = raw.trim().split('.');
    if (parts.length < 3) {
        return { valid: false, raw, reason: `expected at least 3 segments, got ${parts.length}` };
    }
    const bad: string | undefined = parts.find((part: string): boolean => part === '' || FORBIDDEN_SEGMENT.test(part));
    if (bad !== undefined) {
        return { valid: false, raw, reason: bad === '' ? 'empty segment' : `invalid segment "${bad}"` };
    }

    const [actor, action, subject, ...modifiers] = parts;
    return { valid: true, raw: parts.join('.'), actor, action, subject, modifiers };
}

/**
 * Decode a content key, failing the target when it is malformed.
 *
 * @throws {StructuralError} On an invalid key
 */
export function contentKey_require(raw: string): ValidContentKey {
    const key: DecodedContentKey = contentKey_decode(raw);
    if (!key.valid) {
        throw new StructuralError(`Malformed content key "${raw}": ${key.reason}`);
    }
    return key;
}

/**
 * Corpus address of a key: `content/<actor>/<action>/<subject>[_<mod>…].txt`.
 */
export function contentKey_encodePath(key: ValidContentKey): string {
    return `${contentKey_siblingsDir(key)}${contentKey_fileName(key)}`;
}

/**
 * Directory holding the key and its siblings: `content/<actor>/<action>/`.
 */
export function contentKey_siblingsDir(key: ValidContentKey): string {
    return `${CORPUS_ROOT}/${key.actor}/${key.action}/`;
}

/** File name of the key inside its siblings directory. */
export function contentKey_fileName(key: ValidContentKey): string {
    const stem: string = [key.subject, ...key.modifiers].join('_');
    return `${stem}.txt`;
}
