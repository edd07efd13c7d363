/**
 * @file Telemetry Bus
 *
 * Event bus between the pipeline and whatever renders its progress.
 * The pipeline emits through a scoped `PipelineTelemetry`; the CLI
 * presenter subscribes and writes styled lines. Typed facade over
 * Node's EventEmitter.
 *
 * @module core/telemetry
 */

import { EventEmitter } from 'events';

export type TelemetryEvent =
    | { type: 'status'; message: string }
    | { type: 'log'; message: string }
    | { type: 'warn'; message: string }
    | { type: 'error'; message: string; stack?: string }
    | { type: 'summary'; ok: number; failed: number };

export type TelemetryObserver = (event: TelemetryEvent) => void;

/**
 * Emission surface handed to pipeline components.
 */
export interface PipelineTelemetry {
    /** Progress line, always shown. */
    status_emit(message: string): void;
    /** Detail line, shown in verbose mode. */
    log_emit(message: string): void;
    warn_emit(message: string): void;
    error_emit(message: string, cause?: unknown): void;
    summary_emit(ok: number, failed: number): void;
}

const CHANNEL = 'telemetry' as const;

export class TelemetryBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to telemetry events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: TelemetryObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return (): void => {
            this.emitter.off(CHANNEL, observer);
        };
    }

    emit(event: TelemetryEvent): void {
        this.emitter.emit(CHANNEL, event);
    }

    /**
     * Create the emission surface bound to this bus.
     */
    context_create(): PipelineTelemetry {
        return {
            status_emit: (message: string): void => this.emit({ type: 'status', message }),
            log_emit: (message: string): void => this.emit({ type: 'log', message }),
            warn_emit: (message: string): void => this.emit({ type: 'warn', message }),
            error_emit: (message: string, cause?: unknown): void => {
                const stack: string | undefined = cause instanceof Error ? cause.stack : undefined;
                this.emit(stack === undefined ? { type: 'error', message } : { type: 'error', message, stack });
            },
            summary_emit: (ok: number, failed: number): void => this.emit({ type: 'summary', ok, failed }),
        };
    }
}

/**
 * Telemetry sink that records every event, for tests and callers that
 * render nothing.
 */
export function telemetry_record(): { telemetry: PipelineTelemetry; events: TelemetryEvent[] } {
    const bus: TelemetryBus = new TelemetryBus();
    const events: TelemetryEvent[] = [];
    bus.subscribe((event: TelemetryEvent): void => {
        events.push(event);
    });
    return { telemetry: bus.context_create(), events };
}
