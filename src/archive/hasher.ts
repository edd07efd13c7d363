/**
 * @file Archive Hasher
 *
 * djb2 over UTF-16 code units, kept to 32 bits and rendered as eight
 * hex digits. Not cryptographic; only used to make archive file names
 * stable per target.
 *
 * @module archive
 */

export function djb2_hash(text: string): string {
    let hash: number = 5381;
    for (let i: number = 0; i < text.length; i++) {
        hash = (Math.imul(hash, 33) + text.charCodeAt(i)) >>> 0;
    }
    return hash.toString(16).padStart(8, '0');
}

/**
 * Hash identifying one target: `<sequenceId>:<messageId>:<contentKey>`.
 */
export function targetHash_compute(sequenceId: string, messageId: number, contentKey: string): string {
    return djb2_hash(`${sequenceId}:${messageId}:${contentKey}`);
}
