/**
 * @file Batch Runner
 *
 * Processes targets one at a time and reports aggregate counts. With
 * fail-fast set, the first failed target ends the batch.
 *
 * @module pipeline
 */

import { errorMessage_resolve } from '../core/errors.js';
import type { PipelineTelemetry } from '../core/telemetry.js';
import { address_format, type NodeAddress } from '../graph/types.js';
import type { TargetOutcome, TargetPipeline } from './pipeline.js';

export interface BatchSummary {
    ok: number;
    failed: number;
    outcomes: TargetOutcome[];
    /** True when fail-fast stopped the batch before its last target. */
    aborted: boolean;
}

export interface BatchOptions {
    failFast: boolean;
    telemetry: PipelineTelemetry;
}

export async function batch_run(
    pipeline: TargetPipeline,
    targets: NodeAddress[],
    options: BatchOptions,
): Promise<BatchSummary> {
    const summary: BatchSummary = { ok: 0, failed: 0, outcomes: [], aborted: false };

    for (let i: number = 0; i < targets.length; i++) {
        const target: NodeAddress = targets[i];
        let succeeded: boolean;
        try {
            const outcome: TargetOutcome = await pipeline.target_process(target);
            summary.outcomes.push(outcome);
            succeeded = outcome.ok;
        } catch (error: unknown) {
            // Reaches here only when the archive record could not be written.
            options.telemetry.error_emit(`${address_format(target)}: ${errorMessage_resolve(error)}`, error);
            succeeded = false;
        }

        if (succeeded) {
            summary.ok++;
            continue;
        }
        summary.failed++;
        if (options.failFast && i < targets.length - 1) {
            summary.aborted = true;
            options.telemetry.warn_emit(`Fail-fast: skipping ${targets.length - i - 1} remaining target(s)`);
            break;
        }
    }

    options.telemetry.summary_emit(summary.ok, summary.failed);
    return summary;
}
