/**
 * @file In-Memory Storage Backend
 *
 * Flat map of file paths to contents. Directories exist implicitly as
 * prefixes of stored files, or explicitly through `dir_create`.
 *
 * @module store/backend
 */

import { path_parent, type StorageBackend } from '../types.js';

export class MemoryBackend implements StorageBackend {
    private readonly files: Map<string, string> = new Map();
    private readonly dirs: Set<string> = new Set();

    constructor(seed: Record<string, string> = {}) {
        for (const [path, data] of Object.entries(seed)) {
            this.files.set(path_normalize(path), data);
        }
    }

    async artifact_write(path: string, data: string): Promise<void> {
        const key: string = path_normalize(path);
        await this.dir_create(path_parent(key));
        this.files.set(key, data);
    }

    async artifact_append(path: string, data: string): Promise<void> {
        const key: string = path_normalize(path);
        await this.artifact_write(key, (this.files.get(key) ?? '') + data);
    }

    async artifact_read(path: string): Promise<string | null> {
        return this.files.get(path_normalize(path)) ?? null;
    }

    async path_exists(path: string): Promise<boolean> {
        const key: string = path_normalize(path);
        return this.files.has(key) || this.dir_exists(key);
    }

    async children_list(path: string): Promise<string[]> {
        const prefix: string = `${path_normalize(path)}/`;
        const names: Set<string> = new Set();
        for (const candidate of [...this.files.keys(), ...this.dirs]) {
            if (!candidate.startsWith(prefix)) continue;
            const rest: string = candidate.slice(prefix.length);
            if (rest === '') continue;
            names.add(rest.split('/')[0]);
        }
        return Array.from(names);
    }

    async dir_create(path: string): Promise<void> {
        let current: string = path_normalize(path);
        while (current !== '' && current !== '/' && !this.dirs.has(current)) {
            this.dirs.add(current);
            current = path_parent(current);
        }
    }

    /** Snapshot of every stored file, for assertions. */
    files_snapshot(): Record<string, string> {
        return Object.fromEntries(this.files);
    }

    private dir_exists(key: string): boolean {
        if (this.dirs.has(key)) return true;
        const prefix: string = `${key}/`;
        for (const path of this.files.keys()) {
            if (path.startsWith(prefix)) return true;
        }
        return false;
    }
}

function path_normalize(path: string): string {
    const collapsed: string = path.replace(/\/{2,}/g, '/').replace(/^\.\//, '');
    return collapsed.length > 1 ? collapsed.replace(/\/$/, '') : collapsed;
}
