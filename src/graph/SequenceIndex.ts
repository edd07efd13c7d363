/**
 * @file Sequence Index
 *
 * Lazily loads and caches parsed sequence tables. Each sequence is
 * parsed at most once per run; a sequence that does not exist is cached
 * as absent. This is the only state shared between targets of a batch.
 *
 * @module graph
 */

import { StructuralError } from '../core/errors.js';
import { path_join, type StorageBackend } from '../store/types.js';
import { sequence_parse, type SequenceFormat } from './parser/sequence.js';
import type { DialogueNode, NodeAddress, SequenceTable } from './types.js';

/**
 * Where sequence tables come from.
 */
export interface SequenceSource {
    /** Load one sequence. Resolves null when it does not exist. */
    sequence_load(sequenceId: string): Promise<SequenceTable | null>;
}

const SEQUENCE_ID_PATTERN: RegExp = /^[A-Za-z0-9_][\w.-]*$/;

const EXTENSIONS: ReadonlyArray<[string, SequenceFormat]> = [
    ['.json', 'json'],
    ['.yaml', 'yaml'],
    ['.yml', 'yaml'],
];

/**
 * Reads `<dir>/<sequenceId>.json` (or `.yaml`/`.yml`) through a storage
 * backend.
 */
export class FileSequenceSource implements SequenceSource {
    constructor(
        private readonly backend: StorageBackend,
        private readonly dir: string,
    ) {}

    async sequence_load(sequenceId: string): Promise<SequenceTable | null> {
        if (!SEQUENCE_ID_PATTERN.test(sequenceId)) return null;

        for (const [extension, format] of EXTENSIONS) {
            const file: string = path_join(this.dir, `${sequenceId}${extension}`);
            const text: string | null = await this.backend.artifact_read(file);
            if (text === null) continue;

            const table: SequenceTable = sequence_parse(text, format, file);
            if (table.sequenceId !== sequenceId) {
                throw new StructuralError(
                    `Invalid sequence ${file}: declares sequenceId "${table.sequenceId}"`,
                );
            }
            return table;
        }
        return null;
    }
}

/**
 * Populate-once cache of sequence tables keyed by sequence id.
 */
export class SequenceIndex {
    private readonly pending: Map<string, Promise<SequenceTable | null>> = new Map();
    private readonly loaded: Map<string, SequenceTable | null> = new Map();

    constructor(private readonly source: SequenceSource) {}

    /**
     * Load (or return the cached) sequence table.
     */
    async sequence_get(sequenceId: string): Promise<SequenceTable | null> {
        if (this.loaded.has(sequenceId)) return this.loaded.get(sequenceId) ?? null;

        let promise: Promise<SequenceTable | null> | undefined = this.pending.get(sequenceId);
        if (!promise) {
            promise = this.source.sequence_load(sequenceId);
            this.pending.set(sequenceId, promise);
        }
        try {
            const table: SequenceTable | null = await promise;
            this.loaded.set(sequenceId, table);
            return table;
        } finally {
            this.pending.delete(sequenceId);
        }
    }

    async node_find(address: NodeAddress): Promise<DialogueNode | null> {
        const table: SequenceTable | null = await this.sequence_get(address.sequenceId);
        return table?.nodes.get(address.messageId) ?? null;
    }

    /**
     * Address of a sequence's entry node, or null when the sequence is
     * missing.
     */
    async entry_get(sequenceId: string): Promise<NodeAddress | null> {
        const table: SequenceTable | null = await this.sequence_get(sequenceId);
        return table ? { sequenceId, messageId: table.entryMessageId } : null;
    }

    /**
     * Synchronous lookup among already-loaded sequences.
     */
    node_peek(address: NodeAddress): DialogueNode | null {
        return this.loaded.get(address.sequenceId)?.nodes.get(address.messageId) ?? null;
    }
}
