/**
 * @file Pipeline Configuration Schemas
 *
 * Zod runtime schemas for the pipeline configuration document. Every
 * field has a default, so an empty document is a valid configuration;
 * unknown keys are ignored.
 *
 * @module config/schemas
 */

import { z } from 'zod';

export const PROVIDER_PROFILES = ['generic-json', 'openai-chat', 'openai-completions'] as const;

export type ProviderProfile = typeof PROVIDER_PROFILES[number];

const RegexSourceSchema = z.string().refine((source: string): boolean => {
    try {
        new RegExp(source);
        return true;
    } catch {
        return false;
    }
}, 'not a valid regular expression');

export const ProviderSchema = z.object({
    profile:     z.enum(PROVIDER_PROFILES).default('generic-json'),
    base_url:    z.string().default(''),
    model:       z.string().default(''),
    api_key_env: z.string().min(1).default('LLM_API_KEY'),
    mock:        z.boolean().default(false),
    timeout_ms:  z.number().int().positive().default(30000)
});

export const GenSchema = z.object({
    num_variants:         z.number().int().positive().default(8),
    temperature:          z.number().min(0).max(2).default(0.7),
    top_p:                z.number().gt(0).max(1).default(0.9),
    max_bubbles_per_line: z.number().int().positive().default(3),
    max_chars_per_bubble: z.number().int().positive().default(90),
    dedupe_threshold:     z.number().min(0).max(1).default(0.82)
});

export const ContextSchema = z.object({
    history_bubbles:           z.number().int().nonnegative().default(4),
    include_sibling_exemplars: z.boolean().default(true),
    max_exemplars:             z.number().int().nonnegative().default(10),
    samples_per_turn:          z.number().int().nonnegative().default(2)
});

export const StyleSchema = z.object({
    tone:                  z.array(z.string()).default(['friendly', 'concise', 'supportive']),
    forbid_emojis:         z.boolean().default(true),
    allow_pipes:           z.boolean().default(true),
    preserve_placeholders: z.boolean().default(true)
});

export const IoSchema = z.object({
    assets_dir:    z.string().min(1).default('assets'),
    sequences_dir: z.string().min(1).default('assets/sequences'),
    archive_dir:   z.string().min(1).default('archive'),
    dry_run:       z.boolean().default(true),
    verbose:       z.boolean().default(false),
    fail_fast:     z.boolean().default(false)
});

export const RateLimitSchema = z.object({
    rpm:              z.number().int().nonnegative().default(30),
    retry_count:      z.number().int().nonnegative().default(2),
    retry_backoff_ms: z.number().int().nonnegative().default(1000)
});

export const SafetySchema = z.object({
    blocklist:   z.array(z.string().min(1)).default([]),
    pii_regexes: z.array(RegexSourceSchema).default([])
});

export const PipelineConfigSchema = z.object({
    provider:   ProviderSchema.default({}),
    gen:        GenSchema.default({}),
    context:    ContextSchema.default({}),
    style:      StyleSchema.default({}),
    io:         IoSchema.default({}),
    rate_limit: RateLimitSchema.default({}),
    safety:     SafetySchema.default({})
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderSchema>;
export type GenConfig = z.infer<typeof GenSchema>;
export type StyleConfig = z.infer<typeof StyleSchema>;
export type SafetyConfig = z.infer<typeof SafetySchema>;
export type RateLimitConfig = z.infer<typeof RateLimitSchema>;
