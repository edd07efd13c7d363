/**
 * @file Exemplar Collector
 *
 * Reads existing phrasings from the content corpus: the target key's own
 * lines (for deduplication and prompting) and a sample of its siblings
 * (for style grounding).
 *
 * @module content
 */

import { path_join, type StorageBackend } from '../store/types.js';
import {
    contentKey_decode,
    contentKey_encodePath,
    contentKey_fileName,
    contentKey_siblingsDir,
    type DecodedContentKey,
    type ValidContentKey,
} from './contentKey.js';

/**
 * Non-blank, trimmed lines of a corpus text.
 */
export function corpus_lines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map((line: string): string => line.trim())
        .filter((line: string): boolean => line !== '');
}

/**
 * Existing phrasings of one key. A missing file reads as empty.
 */
export async function corpus_read(
    backend: StorageBackend,
    assetsDir: string,
    key: ValidContentKey,
): Promise<string[]> {
    const text: string | null = await backend.artifact_read(path_join(assetsDir, contentKey_encodePath(key)));
    return text === null ? [] : corpus_lines(text);
}

/**
 * Existing phrasings for a raw key string; invalid keys read as empty.
 */
export async function corpus_readRaw(
    backend: StorageBackend,
    assetsDir: string,
    raw: string,
): Promise<string[]> {
    const key: DecodedContentKey = contentKey_decode(raw);
    return key.valid ? corpus_read(backend, assetsDir, key) : [];
}

/**
 * Collect up to `max` sibling phrasings: every `*.txt` file next to the
 * key's own file, in name order, skipping the key's own file.
 */
export async function exemplars_collect(
    backend: StorageBackend,
    assetsDir: string,
    key: ValidContentKey,
    max: number,
): Promise<string[]> {
    if (max <= 0) return [];

    const dir: string = path_join(assetsDir, contentKey_siblingsDir(key));
    const own: string = contentKey_fileName(key);
    const files: string[] = (await backend.children_list(dir))
        .filter((name: string): boolean => name.endsWith('.txt') && name !== own)
        .sort();

    const out: string[] = [];
    for (const name of files) {
        const text: string | null = await backend.artifact_read(path_join(dir, name));
        if (text === null) continue;
        for (const line of corpus_lines(text)) {
            out.push(line);
            if (out.length >= max) return out;
        }
    }
    return out;
}
