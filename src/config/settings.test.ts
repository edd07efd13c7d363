import { describe, it, expect } from 'vitest';
import { SettingsService, config_load, config_parse, config_sample } from './settings.js';
import { PipelineConfigSchema, type PipelineConfig } from './schemas.js';
import { MemoryBackend } from '../store/backend/memory.js';
import { StructuralError } from '../core/errors.js';

const FILE_CONFIG = [
    'provider:',
    '  profile: openai-chat',
    '  model: file-model',
    '  api_key_env: TEST_KEY_VAR',
    'gen:',
    '  num_variants: 4',
    '  dedupe_threshold: 0.9',
    'style:',
    '  tone: [warm, brief]',
    'safety:',
    '  blocklist:',
    '    - darn',
].join('\n');

describe('SettingsService', (): void => {
    it('resolves schema defaults when nothing is configured', (): void => {
        const config: PipelineConfig = new SettingsService({}, {}).snapshot();
        expect(config.provider).toEqual({
            profile: 'generic-json',
            base_url: '',
            model: '',
            api_key_env: 'LLM_API_KEY',
            mock: false,
            timeout_ms: 30000,
        });
        expect(config.gen.num_variants).toBe(8);
        expect(config.gen.dedupe_threshold).toBe(0.82);
        expect(config.context.history_bubbles).toBe(4);
        expect(config.io.dry_run).toBe(true);
        expect(config.rate_limit).toEqual({ rpm: 30, retry_count: 2, retry_backoff_ms: 1000 });
        expect(config.style.tone).toEqual(['friendly', 'concise', 'supportive']);
    });

    it('reads the file layer', (): void => {
        const service: SettingsService = new SettingsService(config_parse(FILE_CONFIG), {});
        const config: PipelineConfig = service.snapshot();
        expect(config.provider.profile).toBe('openai-chat');
        expect(config.provider.model).toBe('file-model');
        expect(config.gen.num_variants).toBe(4);
        expect(config.gen.temperature).toBe(0.7);
        expect(config.style.tone).toEqual(['warm', 'brief']);
        expect(config.safety.blocklist).toEqual(['darn']);
        expect(service.source_get('provider.model')).toBe('file');
        expect(service.source_get('io.dry_run')).toBe('default');
    });

    it('applies cli > env > file precedence', (): void => {
        const service: SettingsService = new SettingsService(config_parse(FILE_CONFIG), {
            LINEFORGE_MODEL: 'env-model',
        });
        expect(service.snapshot().provider.model).toBe('env-model');
        expect(service.source_get('provider.model')).toBe('env');

        expect(service.set('provider.model', 'cli-model')).toEqual({ ok: true, value: 'cli-model' });
        expect(service.snapshot().provider.model).toBe('cli-model');
        expect(service.source_get('provider.model')).toBe('cli');

        service.unset('provider.model');
        expect(service.snapshot().provider.model).toBe('env-model');
    });

    it('coerces override values by key type', (): void => {
        const service: SettingsService = new SettingsService({}, {});
        expect(service.set('io.dry_run', 'false')).toEqual({ ok: true, value: false });
        expect(service.set('gen.num_variants', '3')).toEqual({ ok: true, value: 3 });
        expect(service.set('gen.num_variants', 'many').ok).toBe(false);
        expect(service.set('io.verbose', 'perhaps').ok).toBe(false);
        expect(service.set('nope.key', 1)).toEqual({ ok: false, error: 'Unknown setting key: nope.key' });

        const config: PipelineConfig = service.snapshot();
        expect(config.io.dry_run).toBe(false);
        expect(config.gen.num_variants).toBe(3);
    });

    it('reports schema violations as structural errors', (): void => {
        const service: SettingsService = new SettingsService(config_parse('gen:\n  top_p: 3'), {});
        expect(() => service.snapshot()).toThrow(StructuralError);
        expect(() => service.snapshot()).toThrow(/\[gen\.top_p\]/);

        const badRegex: SettingsService = new SettingsService(config_parse('safety:\n  pii_regexes: ["(unclosed"]'), {});
        expect(() => badRegex.snapshot()).toThrow('not a valid regular expression');
    });

    it('resolves the api key from the configured variable', (): void => {
        const service: SettingsService = new SettingsService(config_parse(FILE_CONFIG), { TEST_KEY_VAR: 'test-secret' });
        expect(service.apiKey_resolve(service.snapshot())).toBe('test-secret');
        expect(new SettingsService({}, {}).apiKey_resolve(PipelineConfigSchema.parse({}))).toBeUndefined();
    });
});

describe('config loading', (): void => {
    it('accepts JSON documents', (): void => {
        expect(config_parse('{"io": {"dry_run": false}}')).toEqual({ io: { dry_run: false } });
    });

    it('rejects non-map documents', (): void => {
        expect(() => config_parse('[1, 2]')).toThrow(StructuralError);
    });

    it('round-trips the sample through the subset parser', (): void => {
        const parsed: PipelineConfig = new SettingsService(config_parse(config_sample()), {}).snapshot();
        expect(parsed).toEqual(PipelineConfigSchema.parse({}));
    });

    it('creates the sample when the file is missing', async (): Promise<void> => {
        const backend: MemoryBackend = new MemoryBackend();
        const first = await config_load(backend, 'config/lineforge.config.yaml', {});
        expect(first.created).toBe(true);
        expect(await backend.artifact_read('config/lineforge.config.yaml')).toBe(config_sample());

        const second = await config_load(backend, 'config/lineforge.config.yaml', {});
        expect(second.created).toBe(false);
        expect(second.settings.snapshot().gen.num_variants).toBe(8);
    });
});
