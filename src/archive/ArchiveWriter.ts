/**
 * @file Archive Writer
 *
 * Persists one audit record per processed target, in write and dry-run
 * mode alike, failures included:
 *
 *   <archive_dir>/YYYY/MM/DD/<epochMillis>_<hash>.json
 *
 * Dates are UTC. The hash is djb2 of `sequence:message:contentKey`.
 *
 * @module archive
 */

import type { FailureKind } from '../core/errors.js';
import type { PipelineConfig } from '../config/schemas.js';
import type { ContextTurn, PathResolution } from '../graph/types.js';
import type { GenerationPrompt } from '../generation/prompt.js';
import type { GenerationResult } from '../generation/GeneratorClient.js';
import type { StateSpec } from '../state/stateSpec.js';
import type { StorageBackend } from '../store/types.js';
import { path_join } from '../store/types.js';
import type { CandidateRejection } from '../validation/validator.js';
import { targetHash_compute } from './hasher.js';

/** Content key recorded when the target's key could not be read. */
export const UNKNOWN_CONTENT_KEY: string = 'unknown.key';

export interface ArchiveRecord {
    timestamp: string;
    mode: 'write' | 'dry-run';
    target: {
        sequenceId: string;
        messageId: number;
        contentKey: string | null;
        targetFile: string | null;
    };
    config: PipelineConfig;
    state: StateSpec;
    resolution: PathResolution | null;
    context: ContextTurn[];
    exemplars: {
        siblingSample: string[];
        existingVariants: string[];
    };
    prompt: GenerationPrompt | null;
    response: GenerationResult | null;
    acceptedVariants: string[];
    rejections: CandidateRejection[];
    error: { kind: FailureKind; message: string } | null;
}

export class ArchiveWriter {
    constructor(
        private readonly backend: StorageBackend,
        private readonly archiveDir: string,
        private readonly clock: () => Date = (): Date => new Date(),
    ) {}

    /**
     * Write a record.
     *
     * @returns Path of the written file
     */
    async record_write(record: ArchiveRecord): Promise<string> {
        const now: Date = this.clock();
        const { sequenceId, messageId, contentKey } = record.target;
        const hash: string = targetHash_compute(sequenceId, messageId, contentKey ?? UNKNOWN_CONTENT_KEY);
        const path: string = path_join(this.archiveDir, dateShard_format(now), `${now.getTime()}_${hash}.json`);

        await this.backend.artifact_write(path, `${JSON.stringify(record, null, 2)}\n`);
        return path;
    }
}

/**
 * `YYYY/MM/DD` in UTC.
 */
export function dateShard_format(date: Date): string {
    const year: string = String(date.getUTCFullYear()).padStart(4, '0');
    const month: string = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day: string = String(date.getUTCDate()).padStart(2, '0');
    return `${year}/${month}/${day}`;
}
