/**
 * @file Pipeline Settings Service
 *
 * Resolves the effective pipeline configuration with deterministic
 * precedence: command-line override > environment > config file >
 * schema default. The result is validated against
 * `PipelineConfigSchema` on every snapshot.
 *
 * @module config
 */

import yaml from 'js-yaml';
import { StructuralError } from '../core/errors.js';
import type { StorageBackend } from '../store/types.js';
import { document_parse } from '../tree/parser.js';
import { tree_toPlain } from '../tree/convert.js';
import type { PlainValue } from '../tree/types.js';
import { PipelineConfigSchema, type PipelineConfig } from './schemas.js';

export type PlainMap = { [key: string]: PlainValue };

export type SettingSource = 'cli' | 'env' | 'file' | 'default';

type OverrideType = 'string' | 'number' | 'boolean';

const OVERRIDE_TYPES = {
    'provider.profile':  'string',
    'provider.base_url': 'string',
    'provider.model':    'string',
    'provider.mock':     'boolean',
    'gen.num_variants':  'number',
    'io.assets_dir':     'string',
    'io.sequences_dir':  'string',
    'io.archive_dir':    'string',
    'io.dry_run':        'boolean',
    'io.verbose':        'boolean',
    'io.fail_fast':      'boolean',
} as const satisfies Record<string, OverrideType>;

export type OverrideKey = keyof typeof OVERRIDE_TYPES;

export type OverrideValue = string | number | boolean;

/** Environment variables that override configuration values. */
export const ENV_OVERRIDES: ReadonlyArray<readonly [string, OverrideKey]> = [
    ['LINEFORGE_MODEL', 'provider.model'],
    ['LINEFORGE_BASE_URL', 'provider.base_url'],
];

export type Environment = Readonly<Record<string, string | undefined>>;

export class SettingsService {
    private readonly overrides: Map<OverrideKey, OverrideValue> = new Map();

    constructor(
        private readonly fileConfig: PlainMap = {},
        private readonly env: Environment = process.env,
    ) {}

    /**
     * Effective configuration.
     *
     * @throws {StructuralError} When the merged document violates the schema
     */
    public snapshot(): PipelineConfig {
        const merged: PlainMap = { ...this.fileConfig };
        for (const [variable, key] of ENV_OVERRIDES) {
            const value: string | undefined = this.env[variable];
            if (value) path_assign(merged, key, value);
        }
        for (const [key, value] of this.overrides) {
            path_assign(merged, key, value);
        }

        const result = PipelineConfigSchema.safeParse(merged);
        if (!result.success) {
            const issues: string = result.error.issues
                .map((i): string => `[${i.path.join('.')}] ${i.message}`)
                .join('; ');
            throw new StructuralError(`Invalid configuration: ${issues}`);
        }
        return result.data;
    }

    /**
     * Set one command-line override with type coercion.
     */
    public set(key: string, value: unknown): { ok: true; value: OverrideValue } | { ok: false; error: string } {
        if (!overrideKey_is(key)) {
            return { ok: false, error: `Unknown setting key: ${key}` };
        }
        const coerced: OverrideValue | null = value_coerce(OVERRIDE_TYPES[key], value);
        if (coerced === null) {
            return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
        }
        this.overrides.set(key, coerced);
        return { ok: true, value: coerced };
    }

    /**
     * Remove one command-line override.
     */
    public unset(key: OverrideKey): void {
        this.overrides.delete(key);
    }

    /**
     * Which layer supplies the effective value of a key.
     */
    public source_get(key: OverrideKey): SettingSource {
        if (this.overrides.has(key)) return 'cli';
        if (ENV_OVERRIDES.some(([variable, target]): boolean => target === key && Boolean(this.env[variable]))) {
            return 'env';
        }
        const [section, field] = key.split('.');
        const block: PlainValue | undefined = this.fileConfig[section];
        if (plainMap_is(block) && block[field] !== undefined) return 'file';
        return 'default';
    }

    /**
     * Bearer credential for the generation backend, read from the
     * environment variable the configuration names.
     */
    public apiKey_resolve(config: PipelineConfig): string | undefined {
        const value: string | undefined = this.env[config.provider.api_key_env];
        return value ? value : undefined;
    }
}

// ─── Loading ────────────────────────────────────────────────────

/**
 * Parse a configuration document (configuration subset or JSON).
 *
 * @throws {StructuralError} On syntax errors
 */
export function config_parse(text: string): PlainMap {
    const plain: PlainValue = tree_toPlain(document_parse(text));
    if (!plainMap_is(plain)) {
        throw new StructuralError('Configuration document must be a map');
    }
    return plain;
}

/**
 * Load the configuration file. A missing file is created from the
 * sample first.
 */
export async function config_load(
    backend: StorageBackend,
    path: string,
    env: Environment = process.env,
): Promise<{ settings: SettingsService; created: boolean }> {
    let text: string | null = await backend.artifact_read(path);
    let created: boolean = false;
    if (text === null) {
        text = config_sample();
        await backend.artifact_write(path, text);
        created = true;
    }
    return { settings: new SettingsService(config_parse(text), env), created };
}

/**
 * Sample configuration document holding every default.
 */
export function config_sample(): string {
    const defaults: PipelineConfig = PipelineConfigSchema.parse({});
    return [
        '# lineforge pipeline configuration',
        '# Every key is optional; these are the defaults.',
        '',
        yaml.dump(defaults, { lineWidth: -1 }),
    ].join('\n');
}

// ─── Helpers ────────────────────────────────────────────────────

function overrideKey_is(key: string): key is OverrideKey {
    return Object.prototype.hasOwnProperty.call(OVERRIDE_TYPES, key);
}

function plainMap_is(value: PlainValue | undefined): value is PlainMap {
    return value !== null && value !== undefined && typeof value === 'object' && !Array.isArray(value);
}

function path_assign(root: PlainMap, dotted: string, value: PlainValue): void {
    const [section, field] = dotted.split('.');
    const current: PlainValue | undefined = root[section];
    const next: PlainMap = plainMap_is(current) ? { ...current } : {};
    next[field] = value;
    root[section] = next;
}

function value_coerce(type: OverrideType, value: unknown): OverrideValue | null {
    switch (type) {
        case 'string': {
            const s: string = String(value).trim();
            return s === '' ? null : s;
        }
        case 'number': {
            const n: number = typeof value === 'number' ? value : Number(String(value).trim());
            return Number.isFinite(n) && String(value).trim() !== '' ? n : null;
        }
        case 'boolean': {
            if (typeof value === 'boolean') return value;
            const s: string = String(value).trim().toLowerCase();
            if (['true', '1', 'yes', 'on'].includes(s)) return true;
            if (['false', '0', 'no', 'off'].includes(s)) return false;
            return null;
        }
    }
}
