/**
 * @file CLI Runner
 *
 * Wires configuration, storage, telemetry and the pipeline together for
 * one command-line invocation and maps the outcome to an exit status:
 * 0 when every target succeeded, 1 on any failure, 2 on usage errors.
 *
 * @module cli
 */

import chalk, { type ChalkInstance } from 'chalk';
import { ArchiveWriter } from '../archive/ArchiveWriter.js';
import { errorMessage_resolve, StructuralError } from '../core/errors.js';
import { TelemetryBus, type PipelineTelemetry } from '../core/telemetry.js';
import type { PipelineConfig } from '../config/schemas.js';
import { config_load, config_sample, type Environment } from '../config/settings.js';
import { GeneratorClient } from '../generation/GeneratorClient.js';
import type { Transport } from '../generation/transport.js';
import { FileSequenceSource, SequenceIndex } from '../graph/SequenceIndex.js';
import type { NodeAddress } from '../graph/types.js';
import { batch_run, type BatchSummary } from '../pipeline/batch.js';
import { TargetPipeline, type StateProvider } from '../pipeline/pipeline.js';
import { targets_parse } from '../pipeline/targets.js';
import { stateSpec_fromPlain, type StateSpec } from '../state/stateSpec.js';
import type { StorageBackend } from '../store/types.js';
import { tree_toPlain } from '../tree/convert.js';
import { document_parse } from '../tree/parser.js';
import type { PlainValue } from '../tree/types.js';
import { args_parse, UsageError, USAGE, type CliOptions, type TargetSelection } from './args.js';
import { ConsolePresenter, MARKERS, type LineWriter } from './presenter.js';

export interface CliDeps {
    backend: StorageBackend;
    env: Environment;
    out: LineWriter;
    err: LineWriter;
    chalk?: ChalkInstance;
    /** Backend transport; the fetch transport when omitted. */
    transport?: Transport;
}

export async function cli_run(argv: string[], deps: CliDeps): Promise<number> {
    const style: ChalkInstance = deps.chalk ?? chalk;
    const failure_print = (message: string): void => {
        deps.err(style.red(`${MARKERS.ERROR} ${message}`));
    };

    let options: CliOptions;
    try {
        options = args_parse(argv);
    } catch (error: unknown) {
        if (!(error instanceof UsageError)) throw error;
        failure_print(error.message);
        deps.err(USAGE);
        return 2;
    }

    if (options.help) {
        deps.out(USAGE);
        return 0;
    }

    try {
        if (options.initConfig) {
            if (await deps.backend.path_exists(options.configPath)) {
                failure_print(`${options.configPath} already exists`);
                return 1;
            }
            await deps.backend.artifact_write(options.configPath, config_sample());
            deps.out(style.cyan(`${MARKERS.AFFIRMATIVE} Wrote sample configuration to ${options.configPath}`));
            return 0;
        }

        const { settings, created } = await config_load(deps.backend, options.configPath, deps.env);
        for (const [key, value] of options.overrides) {
            const result = settings.set(key, value);
            if (!result.ok) {
                failure_print(result.error);
                return 2;
            }
        }
        const config: PipelineConfig = settings.snapshot();

        const bus: TelemetryBus = new TelemetryBus();
        const presenter: ConsolePresenter = new ConsolePresenter({
            verbose: config.io.verbose,
            chalk: style,
            out: deps.out,
            err: deps.err,
        });
        const detach: () => void = presenter.attach(bus);
        const telemetry: PipelineTelemetry = bus.context_create();
        try {
            if (created) telemetry.status_emit(`Created sample configuration at ${options.configPath}`);
            const summary: BatchSummary = await targets_run(options, config, settings.apiKey_resolve(config), telemetry, deps);
            return summary.failed > 0 ? 1 : 0;
        } finally {
            detach();
        }
    } catch (error: unknown) {
        failure_print(errorMessage_resolve(error));
        return 1;
    }
}

async function targets_run(
    options: CliOptions,
    config: PipelineConfig,
    apiKey: string | undefined,
    telemetry: PipelineTelemetry,
    deps: CliDeps,
): Promise<BatchSummary> {
    const { backend } = deps;
    const targets: NodeAddress[] = await targets_load(backend, options.targets);
    const state: StateProvider | undefined = options.statePath === null
        ? undefined
        : await stateProvider_load(backend, options.statePath, targets);

    const generator: GeneratorClient = new GeneratorClient(config, { transport: deps.transport, apiKey, telemetry });
    const pipeline: TargetPipeline = new TargetPipeline({
        config,
        backend,
        index: new SequenceIndex(new FileSequenceSource(backend, config.io.sequences_dir)),
        generator,
        archive: new ArchiveWriter(backend, config.io.archive_dir),
        telemetry,
        state,
    });

    const mode: string = config.io.dry_run ? 'dry run' : 'write';
    telemetry.status_emit(`Mode: ${mode}${generator.mock_active() ? ' (mock generator)' : ''}`);
    if (targets.length === 0) telemetry.warn_emit('No targets to process');

    return batch_run(pipeline, targets, { failFast: config.io.fail_fast, telemetry });
}

async function targets_load(backend: StorageBackend, selection: TargetSelection | null): Promise<NodeAddress[]> {
    if (selection === null) return [];
    if (selection.kind === 'single') return [selection.address];

    const text: string | null = await backend.artifact_read(selection.path);
    if (text === null) {
        throw new StructuralError(`Target list not found: ${selection.path}`);
    }
    return targets_parse(text);
}

/**
 * Load a state specification once; each target gets it with its own
 * sequence as the fallback entry.
 */
async function stateProvider_load(
    backend: StorageBackend,
    path: string,
    targets: NodeAddress[],
): Promise<StateProvider> {
    const text: string | null = await backend.artifact_read(path);
    if (text === null) {
        throw new StructuralError(`State specification not found: ${path}`);
    }
    const raw: PlainValue = tree_toPlain(document_parse(text));
    if (targets.length > 0) stateSpec_fromPlain(raw, targets[0].sequenceId, path);

    return (target: NodeAddress): StateSpec => stateSpec_fromPlain(raw, target.sequenceId, path);
}
