/**
 * @file Console Presenter
 *
 * Renders telemetry events as styled console lines in the marker
 * dialect:
 *
 *   ● status        ○ detail (verbose)
 *   >> WARNING: …   >> ERROR: …
 *   » summary
 *
 * @module cli
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { TelemetryBus, TelemetryEvent } from '../core/telemetry.js';

export const MARKERS = {
    AFFIRMATIVE: '●',
    INFO: '○',
    ERROR: '>> ERROR:',
    WARNING: '>> WARNING:',
    HINT: '»',
} as const;

export type LineWriter = (line: string) => void;

export interface PresenterOptions {
    verbose: boolean;
    /** Defaults to the auto-detecting chalk instance. */
    chalk?: ChalkInstance;
    out?: LineWriter;
    err?: LineWriter;
}

export class ConsolePresenter {
    private readonly style: ChalkInstance;
    private readonly out: LineWriter;
    private readonly err: LineWriter;

    constructor(private readonly options: PresenterOptions) {
        this.style = options.chalk ?? chalk;
        this.out = options.out ?? ((line: string): void => console.log(line));
        this.err = options.err ?? ((line: string): void => console.error(line));
    }

    /**
     * Subscribe to a bus.
     *
     * @returns Unsubscribe function.
     */
    attach(bus: TelemetryBus): () => void {
        return bus.subscribe((event: TelemetryEvent): void => this.event_render(event));
    }

    event_render(event: TelemetryEvent): void {
        switch (event.type) {
            case 'status':
                this.out(this.style.cyan(`${MARKERS.AFFIRMATIVE} ${event.message}`));
                break;
            case 'log':
                if (this.options.verbose) this.out(this.style.white(`${MARKERS.INFO} ${event.message}`));
                break;
            case 'warn':
                this.err(this.style.yellow(`${MARKERS.WARNING} ${event.message}`));
                break;
            case 'error':
                this.err(this.style.red(`${MARKERS.ERROR} ${event.message}`));
                if (this.options.verbose && event.stack) this.err(this.style.dim(event.stack));
                break;
            case 'summary': {
                const line: string = `${MARKERS.HINT} Done. ok=${event.ok} fail=${event.failed}`;
                this.out(event.failed > 0 ? this.style.red(line) : this.style.green(line));
                break;
            }
        }
    }
}
