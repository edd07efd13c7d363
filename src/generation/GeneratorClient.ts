/**
 * @file Generator Client
 *
 * Drives the generation backend for one prompt: builds the request for
 * the configured profile, paces requests to the configured rate,
 * retries transient failures with fixed backoff, and strips a sampling
 * parameter the backend refuses.
 *
 * Mock mode (`provider.mock`, or any dry run) answers deterministically
 * without touching the transport.
 *
 * @module generation
 */

import {
    GenerationError,
    ProviderApiError,
    ResponseShapeError,
    StructuralError,
    errorMessage_resolve,
} from '../core/errors.js';
import type { PipelineTelemetry } from '../core/telemetry.js';
import type { PipelineConfig } from '../config/schemas.js';
import { BUBBLE_SEPARATOR, type GenerationPrompt } from './prompt.js';
import {
    rejectedParameter_find,
    requestBody_build,
    variants_extract,
    type RequestBody,
    type StrippableParameter,
} from './providers.js';
import { FetchTransport, type Transport, type TransportResponse } from './transport.js';

const SNIPPET_LENGTH: number = 300;

export interface GenerationResult {
    variants: string[];
    /** Parsed response body; null in mock mode. */
    raw: unknown;
    /** Body of the last request sent; null in mock mode. */
    requestSent: RequestBody | null;
    attempts: number;
    strippedParameters: StrippableParameter[];
}

export interface GeneratorClientOptions {
    transport?: Transport;
    sleep?: (ms: number) => Promise<void>;
    clock?: () => number;
    apiKey?: string;
    telemetry?: PipelineTelemetry;
}

export class GeneratorClient {
    private readonly transport: Transport;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly clock: () => number;
    private readonly apiKey: string | undefined;
    private readonly telemetry: PipelineTelemetry | undefined;
    private lastRequestAt: number | null = null;

    constructor(
        private readonly config: PipelineConfig,
        options: GeneratorClientOptions = {},
    ) {
        this.transport = options.transport ?? new FetchTransport();
        this.sleep = options.sleep ?? delay;
        this.clock = options.clock ?? Date.now;
        this.apiKey = options.apiKey;
        this.telemetry = options.telemetry;
    }

    /**
     * True when no request will reach the backend.
     */
    public mock_active(): boolean {
        return this.config.provider.mock || this.config.io.dry_run;
    }

    /**
     * Generate candidate lines for a prompt.
     *
     * @throws {StructuralError} When live mode lacks a base URL or credential
     * @throws {GenerationError} When every attempt failed
     */
    public async variants_generate(prompt: GenerationPrompt): Promise<GenerationResult> {
        if (this.mock_active()) {
            return {
                variants: mockVariants_build(prompt.task.contentKey, this.config.gen.num_variants),
                raw: null,
                requestSent: null,
                attempts: 0,
                strippedParameters: [],
            };
        }

        const { provider, rate_limit } = this.config;
        if (provider.base_url.trim() === '') {
            throw new StructuralError('provider.base_url is not configured');
        }
        if (!this.apiKey) {
            throw new StructuralError(`Missing API key: set ${provider.api_key_env}`);
        }

        const stripped: Set<StrippableParameter> = new Set();
        let attempts: number = 0;
        let retries: number = 0;

        for (;;) {
            const body: RequestBody = requestBody_build(provider.profile, prompt, this.config, stripped);
            attempts++;
            try {
                const response: TransportResponse = await this.paced_send(body);

                if (response.status < 200 || response.status >= 300) {
                    const refused: StrippableParameter | null = stripped.size === 0
                        ? rejectedParameter_find(response.status, response.body, body)
                        : null;
                    if (refused !== null) {
                        stripped.add(refused);
                        this.telemetry?.warn_emit(`Backend refused "${refused}"; retrying without it`);
                        continue;
                    }
                    throw new ProviderApiError({
                        statusCode: response.status,
                        responseSnippet: response.body.slice(0, SNIPPET_LENGTH),
                    });
                }

                const raw: unknown = responseBody_parse(response.body);
                return {
                    variants: variants_extract(raw),
                    raw,
                    requestSent: body,
                    attempts,
                    strippedParameters: [...stripped],
                };
            } catch (error: unknown) {
                const strippedRetryRefused: boolean = stripped.size > 0
                    && error instanceof ProviderApiError
                    && error.kind === 'rejection';
                if (strippedRetryRefused || retries >= rate_limit.retry_count) {
                    throw new GenerationError(
                        `Generation failed after ${attempts} attempt(s): ${errorMessage_resolve(error)}`,
                        attempts,
                        error,
                    );
                }
                retries++;
                this.telemetry?.log_emit(
                    `Attempt ${attempts} failed (${errorMessage_resolve(error)}); retrying in ${rate_limit.retry_backoff_ms} ms`,
                );
                await this.sleep(rate_limit.retry_backoff_ms);
            }
        }
    }

    /**
     * Send one request, waiting first so request starts are at least
     * `60000 / rpm` ms apart. An rpm of 0 disables pacing.
     */
    private async paced_send(body: RequestBody): Promise<TransportResponse> {
        const rpm: number = this.config.rate_limit.rpm;
        if (rpm > 0 && this.lastRequestAt !== null) {
            const interval: number = 60000 / rpm;
            const wait: number = this.lastRequestAt + interval - this.clock();
            if (wait > 0) await this.sleep(wait);
        }
        this.lastRequestAt = this.clock();

        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
        };
        if (this.apiKey) headers['Authorization'] = `Bearer ${this.apiKey}`;

        return this.transport.request_send({
            url: this.config.provider.base_url,
            headers,
            body: JSON.stringify(body),
            timeoutMs: this.config.provider.timeout_ms,
        });
    }
}

/**
 * Deterministic stand-in output: `[<key>] Variant <n> ||| Second bubble (optional)`.
 */
export function mockVariants_build(contentKey: string, count: number): string[] {
    const lines: string[] = [];
    for (let n: number = 1; n <= count; n++) {
        lines.push(`[${contentKey}] Variant ${n} ${BUBBLE_SEPARATOR} Second bubble (optional)`);
    }
    return lines;
}

function responseBody_parse(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error: unknown) {
        throw new ResponseShapeError('Backend response is not JSON', { cause: error });
    }
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve: () => void): void => {
        setTimeout(resolve, ms);
    });
}
