/**
 * @file Filesystem Storage Backend
 *
 * Implements StorageBackend against the local filesystem through
 * `node:fs/promises`. Relative paths resolve against the root directory
 * given at construction.
 *
 * @module store/backend
 */

import { promises as fs, type Stats } from 'fs';
import * as path from 'path';
import type { StorageBackend } from '../types.js';

export class FsBackend implements StorageBackend {
    constructor(private readonly rootDir: string = process.cwd()) {}

    async artifact_write(target: string, data: string): Promise<void> {
        const abs: string = this.path_resolve(target);
        await fs.mkdir(path.dirname(abs), { recursive: true });
        await fs.writeFile(abs, data, 'utf-8');
    }

    async artifact_append(target: string, data: string): Promise<void> {
        const abs: string = this.path_resolve(target);
        await fs.mkdir(path.dirname(abs), { recursive: true });
        await fs.appendFile(abs, data, 'utf-8');
    }

    async artifact_read(target: string): Promise<string | null> {
        const abs: string = this.path_resolve(target);
        if (!(await this.kind_check(abs, 'file'))) return null;
        return fs.readFile(abs, 'utf-8');
    }

    async path_exists(target: string): Promise<boolean> {
        return (await this.stat_get(this.path_resolve(target))) !== null;
    }

    async children_list(target: string): Promise<string[]> {
        const abs: string = this.path_resolve(target);
        if (!(await this.kind_check(abs, 'dir'))) return [];
        return fs.readdir(abs);
    }

    async dir_create(target: string): Promise<void> {
        await fs.mkdir(this.path_resolve(target), { recursive: true });
    }

    private path_resolve(target: string): string {
        return path.resolve(this.rootDir, target);
    }

    private async kind_check(abs: string, kind: 'file' | 'dir'): Promise<boolean> {
        const stat: Stats | null = await this.stat_get(abs);
        if (!stat) return false;
        return kind === 'file' ? stat.isFile() : stat.isDirectory();
    }

    /** `stat`, with a missing path reported as null. */
    private async stat_get(abs: string): Promise<Stats | null> {
        try {
            return await fs.stat(abs);
        } catch (error: unknown) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
            throw error;
        }
    }
}
