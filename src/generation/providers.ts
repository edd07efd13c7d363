/**
 * @file Provider Profiles
 *
 * Request body shapes and response extraction per backend profile:
 *
 * - `generic-json`       `{ model, temperature, top_p, n, prompt: <object> }`
 * - `openai-chat`        `{ model, temperature, top_p, messages, response_format }`
 * - `openai-completions` `{ model, temperature, top_p, n, prompt: <string> }`
 *
 * Responses are recognised in order: a direct `variants` list, chat
 * `choices[].message.content` holding JSON with `variants`, then
 * completion `choices[].text`.
 *
 * @module generation
 */

import { z } from 'zod';
import { ResponseShapeError } from '../core/errors.js';
import type { PipelineConfig, ProviderProfile } from '../config/schemas.js';
import type { GenerationPrompt } from './prompt.js';

/** Optional request parameters a backend may refuse; each can be stripped. */
export const STRIPPABLE_PARAMETERS = ['temperature', 'top_p', 'n', 'response_format'] as const;

export type StrippableParameter = typeof STRIPPABLE_PARAMETERS[number];

export type RequestBody = Record<string, unknown>;

// ─── Request ────────────────────────────────────────────────────

/**
 * Build the request body for a profile, leaving out stripped parameters.
 */
export function requestBody_build(
    profile: ProviderProfile,
    prompt: GenerationPrompt,
    config: PipelineConfig,
    stripped: ReadonlySet<StrippableParameter> = new Set(),
): RequestBody {
    const sampling: RequestBody = {
        temperature: config.gen.temperature,
        top_p: config.gen.top_p,
    };

    let body: RequestBody;
    switch (profile) {
        case 'generic-json':
            body = { model: config.provider.model, ...sampling, n: config.gen.num_variants, prompt };
            break;
        case 'openai-chat':
            body = {
                model: config.provider.model,
                ...sampling,
                messages: [
                    { role: 'system', content: prompt.system },
                    { role: 'user', content: JSON.stringify(promptPayload_build(prompt)) },
                ],
                response_format: { type: 'json_object' },
            };
            break;
        case 'openai-completions':
            body = {
                model: config.provider.model,
                ...sampling,
                n: config.gen.num_variants,
                prompt: JSON.stringify(prompt),
            };
            break;
        default: {
            const unreachable: never = profile;
            return unreachable;
        }
    }

    for (const parameter of stripped) {
        delete body[parameter];
    }
    return body;
}

function promptPayload_build(prompt: GenerationPrompt): Omit<GenerationPrompt, 'system'> {
    return {
        task: prompt.task,
        context: prompt.context,
        exemplars: prompt.exemplars,
        output_format: prompt.output_format,
    };
}

// ─── Rejection Adaptation ───────────────────────────────────────

const REFUSAL_WORDING: RegExp = /unsupported|not supported|unknown|invalid|unrecognized|unrecognised|not allowed|does not support/i;

/**
 * The parameter a 400/422 rejection complains about, if it is one we
 * sent and may strip.
 */
export function rejectedParameter_find(
    status: number,
    responseBody: string,
    request: RequestBody,
): StrippableParameter | null {
    if (status !== 400 && status !== 422) return null;
    if (!REFUSAL_WORDING.test(responseBody)) return null;

    for (const parameter of STRIPPABLE_PARAMETERS) {
        if (!(parameter in request)) continue;
        const mention: RegExp = new RegExp(`(^|[^A-Za-z0-9_])${parameter}([^A-Za-z0-9_]|$)`);
        if (mention.test(responseBody)) return parameter;
    }
    return null;
}

// ─── Response ───────────────────────────────────────────────────

const VariantsResponseSchema = z.object({
    variants: z.array(z.unknown())
});

const ChoicesResponseSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable().optional() }).passthrough().optional(),
        text:    z.string().optional()
    }).passthrough())
});

/**
 * Extract candidate lines from a backend response.
 *
 * @throws {ResponseShapeError} When no recognised shape matches
 */
export function variants_extract(response: unknown): string[] {
    const direct = VariantsResponseSchema.safeParse(response);
    if (direct.success) {
        return direct.data.variants.flatMap(variant_stringify);
    }

    const choices = ChoicesResponseSchema.safeParse(response);
    if (choices.success) {
        const contents: string[] = choices.data.choices
            .map((choice): string | null | undefined => choice.message?.content)
            .filter((content: string | null | undefined): content is string => typeof content === 'string');
        if (contents.length > 0) {
            return contents.flatMap(content_parse);
        }

        const texts: string[] = choices.data.choices
            .map((choice): string | undefined => choice.text)
            .filter((text: string | undefined): text is string => typeof text === 'string');
        if (texts.length > 0) return texts;
    }

    throw new ResponseShapeError('Cannot extract variants from response');
}

/**
 * Chat message content: JSON with `variants` (possibly inside a code
 * fence), a JSON list, or plain text with one candidate per line.
 */
export function content_parse(content: string): string[] {
    const unfenced: string = content
        .trim()
        .replace(/^```[A-Za-z]*\s*\n?/, '')
        .replace(/\n?```\s*$/, '')
        .trim();

    const parsed: unknown = json_tryParse(unfenced);
    if (parsed !== undefined) {
        const direct = VariantsResponseSchema.safeParse(parsed);
        if (direct.success) return direct.data.variants.flatMap(variant_stringify);
        if (Array.isArray(parsed)) return parsed.flatMap(variant_stringify);
    }

    return unfenced
        .split(/\r?\n/)
        .map((line: string): string => line.trim())
        .filter((line: string): boolean => line !== '');
}

/**
 * `JSON.parse`, with non-JSON input reported as undefined. Plain-text
 * content is an expected response shape, not an error.
 */
function json_tryParse(text: string): unknown {
    if (!/^[[{]/.test(text)) return undefined;
    try {
        return JSON.parse(text);
    } catch (error: unknown) {
        if (error instanceof SyntaxError) return undefined;
        throw error;
    }
}

function variant_stringify(value: unknown): string[] {
    if (typeof value === 'string') return [value];
    if (typeof value === 'number' || typeof value === 'boolean') return [String(value)];
    return [];
}
