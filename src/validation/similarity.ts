/**
 * @file Token-Set Similarity
 *
 * Unordered token-set Jaccard similarity used for near-duplicate
 * detection. Reordered phrasings with the same words score 1.
 *
 * @module validation
 */

/**
 * Lowercased token set. Characters outside `[a-z0-9|]` become
 * separators, so `|||` survives as a token.
 */
export function tokens_extract(text: string): Set<string> {
    return new Set(
        text
            .toLowerCase()
            .replace(/[^a-z0-9\s|]/g, ' ')
            .split(/\s+/)
            .filter((token: string): boolean => token !== ''),
    );
}

/**
 * Jaccard index of two token sets; 0 when both are empty.
 */
export function jaccard_compute(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    let shared: number = 0;
    for (const token of a) {
        if (b.has(token)) shared++;
    }
    const union: number = a.size + b.size - shared;
    return union === 0 ? 0 : shared / union;
}
