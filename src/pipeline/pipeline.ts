/**
 * @file Target Pipeline
 *
 * Runs one target through every stage:
 *
 *   content key → path → context window → exemplars → prompt →
 *   generation → validation → append (write mode) → archive
 *
 * The archive record is written for every target that reaches the
 * pipeline, including failures and dry runs. Accepted lines are only
 * appended after the whole batch of candidates has been validated.
 *
 * @module pipeline
 */

import { ArchiveWriter, type ArchiveRecord } from '../archive/ArchiveWriter.js';
import { contentKey_encodePath, contentKey_require, type ValidContentKey } from '../content/contentKey.js';
import { corpus_read, exemplars_collect } from '../content/exemplars.js';
import { errorMessage_resolve, failureKind_resolve, StructuralError } from '../core/errors.js';
import type { PipelineTelemetry } from '../core/telemetry.js';
import type { PipelineConfig } from '../config/schemas.js';
import { GeneratorClient, type GenerationResult } from '../generation/GeneratorClient.js';
import { path_describe, prompt_build, type GenerationPrompt } from '../generation/prompt.js';
import { contextSamples_attach, contextWindow_build } from '../graph/context.js';
import { path_resolve } from '../graph/resolver.js';
import type { SequenceIndex } from '../graph/SequenceIndex.js';
import {
    address_format,
    type ContextTurn,
    type DialogueNode,
    type NodeAddress,
    type PathResolution,
} from '../graph/types.js';
import { stateSpec_default, type StateSpec } from '../state/stateSpec.js';
import { path_join, type StorageBackend } from '../store/types.js';
import { rules_fromConfig, variants_review, type ValidationReview } from '../validation/validator.js';

export type StateProvider = (target: NodeAddress) => StateSpec;

export interface TargetPipelineDeps {
    config: PipelineConfig;
    backend: StorageBackend;
    index: SequenceIndex;
    generator: GeneratorClient;
    archive: ArchiveWriter;
    telemetry: PipelineTelemetry;
    /** State to resolve each target under; defaults to the target sequence's entry. */
    state?: StateProvider;
    clock?: () => Date;
}

export interface TargetOutcome {
    target: NodeAddress;
    ok: boolean;
    contentKey: string | null;
    accepted: string[];
    /** Corpus file the accepted lines belong to. */
    targetFile: string | null;
    /** Whether accepted lines were appended (write mode). */
    appended: boolean;
    archivePath: string;
    error: string | null;
}

export class TargetPipeline {
    private readonly state: StateProvider;
    private readonly clock: () => Date;

    constructor(private readonly deps: TargetPipelineDeps) {
        this.state = deps.state ?? ((target: NodeAddress): StateSpec => stateSpec_default(target.sequenceId));
        this.clock = deps.clock ?? ((): Date => new Date());
    }

    /**
     * Process one target. Stage failures are recorded in the outcome and
     * the archive; only a failing archive write rejects.
     */
    async target_process(target: NodeAddress): Promise<TargetOutcome> {
        const { config, telemetry } = this.deps;
        const label: string = address_format(target);
        const writeMode: boolean = !config.io.dry_run;
        const state: StateSpec = this.state(target);

        const record: ArchiveRecord = {
            timestamp: this.clock().toISOString(),
            mode: writeMode ? 'write' : 'dry-run',
            target: { ...target, contentKey: null, targetFile: null },
            config,
            state,
            resolution: null,
            context: [],
            exemplars: { siblingSample: [], existingVariants: [] },
            prompt: null,
            response: null,
            acceptedVariants: [],
            rejections: [],
            error: null,
        };

        telemetry.status_emit(`Processing ${label}`);
        let appended: boolean = false;
        try {
            appended = await this.stages_run(target, state, record);
        } catch (error: unknown) {
            record.error = { kind: failureKind_resolve(error), message: errorMessage_resolve(error) };
            telemetry.error_emit(`${label}: ${errorMessage_resolve(error)}`, error);
        }

        const archivePath: string = await this.deps.archive.record_write(record);
        telemetry.log_emit(`Archived ${archivePath}`);

        return {
            target,
            ok: record.error === null,
            contentKey: record.target.contentKey,
            accepted: record.acceptedVariants,
            targetFile: record.target.targetFile,
            appended,
            archivePath,
            error: record.error === null ? null : record.error.message,
        };
    }

    /**
     * Stages filling `record` as they complete. Returns whether lines
     * were appended.
     */
    private async stages_run(target: NodeAddress, state: StateSpec, record: ArchiveRecord): Promise<boolean> {
        const { config, backend, index, telemetry } = this.deps;
        const label: string = address_format(target);
        const assetsDir: string = config.io.assets_dir;

        const node: DialogueNode | null = await index.node_find(target);
        if (!node) {
            throw new StructuralError(`Target ${label} does not exist`);
        }
        if (!node.contentKey) {
            throw new StructuralError(`Target ${label} has no content key`);
        }
        record.target.contentKey = node.contentKey;
        const key: ValidContentKey = contentKey_require(node.contentKey);
        const targetFile: string = path_join(assetsDir, contentKey_encodePath(key));
        record.target.targetFile = targetFile;

        const resolution: PathResolution = await path_resolve(index, state, target);
        record.resolution = resolution;
        if (resolution.fellBack) {
            telemetry.warn_emit(`No path reaches ${label}; using the target alone`);
        }
        telemetry.log_emit(`Path: ${path_describe(resolution.path)}`);

        const window: ContextTurn[] = contextWindow_build(
            resolution.path,
            (address: NodeAddress): DialogueNode | null => index.node_peek(address),
            { historyTurns: config.context.history_bubbles },
        );
        const context: ContextTurn[] = await contextSamples_attach(
            window,
            backend,
            assetsDir,
            config.context.samples_per_turn,
        );
        record.context = context;

        const existing: string[] = await corpus_read(backend, assetsDir, key);
        const siblings: string[] = config.context.include_sibling_exemplars
            ? await exemplars_collect(backend, assetsDir, key, config.context.max_exemplars)
            : [];
        record.exemplars = { siblingSample: siblings, existingVariants: existing };
        telemetry.log_emit(
            `Context turns: ${context.length}; existing lines: ${existing.length}; sibling exemplars: ${siblings.length}`,
        );

        const prompt: GenerationPrompt = prompt_build({
            contentKey: node.contentKey,
            path: resolution.path,
            defaultText: node.text,
            context,
            existingVariants: existing,
            siblingExemplars: siblings,
            config,
        });
        record.prompt = prompt;

        const response: GenerationResult = await this.deps.generator.variants_generate(prompt);
        record.response = response;

        const review: ValidationReview = variants_review(response.variants, existing, rules_fromConfig(config));
        record.acceptedVariants = review.accepted;
        record.rejections = review.rejected;
        telemetry.status_emit(`${label}: accepted ${review.accepted.length} of ${response.variants.length} candidate(s)`);

        if (review.accepted.length === 0) return false;

        if (config.io.dry_run) {
            telemetry.status_emit(`Dry run: ${review.accepted.length} line(s) would be appended to ${targetFile}`);
            for (const line of review.accepted) {
                telemetry.status_emit(`  + ${line}`);
            }
            return false;
        }

        await lines_append(backend, targetFile, review.accepted);
        telemetry.status_emit(`Appended ${review.accepted.length} line(s) to ${targetFile}`);
        return true;
    }
}

/**
 * Append lines to a corpus file, starting on a fresh line.
 */
export async function lines_append(backend: StorageBackend, path: string, lines: string[]): Promise<void> {
    const current: string | null = await backend.artifact_read(path);
    const lead: string = current !== null && current !== '' && !current.endsWith('\n') ? '\n' : '';
    await backend.artifact_append(path, `${lead}${lines.join('\n')}\n`);
}
