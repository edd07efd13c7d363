/**
 * @file Command-Line Arguments
 *
 * Flags accept `--flag value` or `--flag=value`. Setting flags map onto
 * configuration override keys and take precedence over the environment
 * and the config file.
 *
 * @module cli
 */

import type { OverrideKey } from '../config/settings.js';
import type { NodeAddress } from '../graph/types.js';

export const DEFAULT_CONFIG_PATH: string = 'config/lineforge.config.yaml';

export const USAGE: string = `lineforge: generate alternative phrasings for dialogue lines

Usage:
  lineforge --sequence <id> --message <n> [options]
  lineforge --list <file> [options]
  lineforge --init-config [--config <file>]

Targets:
  --sequence <id>        Sequence id of the target line
  --message <n>          Message id within the sequence
  --list <file>          File of sequence:message lines (# comments allowed)

Options:
  --config <file>        Configuration file (default: ${DEFAULT_CONFIG_PATH})
  --init-config          Write the sample configuration and exit
  --state <file>         State specification for path resolution
  --write                Append accepted lines to the corpus (default: dry run)
  --dry-run              Never append, use the mock generator
  --mock                 Use the mock generator even in write mode
  --verbose              Show per-stage detail and stack traces
  --fail-fast            Stop at the first failed target
  --profile <name>       Backend profile (generic-json, openai-chat, openai-completions)
  --model <name>         Backend model
  --base-url <url>       Backend endpoint
  --num-variants <n>     Candidates requested per target
  --assets-dir <dir>     Content corpus root
  --sequences-dir <dir>  Sequence document directory
  --archive-dir <dir>    Archive root
  --help, -h             Show this help`;

/**
 * Bad command line. Exits with status 2.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export type TargetSelection =
    | { kind: 'single'; address: NodeAddress }
    | { kind: 'list'; path: string };

export interface CliOptions {
    help: boolean;
    initConfig: boolean;
    configPath: string;
    statePath: string | null;
    targets: TargetSelection | null;
    overrides: Array<[OverrideKey, string | boolean]>;
}

const VALUE_OVERRIDES: Readonly<Record<string, OverrideKey>> = {
    '--profile': 'provider.profile',
    '--model': 'provider.model',
    '--base-url': 'provider.base_url',
    '--num-variants': 'gen.num_variants',
    '--assets-dir': 'io.assets_dir',
    '--sequences-dir': 'io.sequences_dir',
    '--archive-dir': 'io.archive_dir',
};

const SWITCH_OVERRIDES: Readonly<Record<string, [OverrideKey, boolean]>> = {
    '--write': ['io.dry_run', false],
    '--dry-run': ['io.dry_run', true],
    '--mock': ['provider.mock', true],
    '--verbose': ['io.verbose', true],
    '--fail-fast': ['io.fail_fast', true],
};

/**
 * Parse arguments (without the node and script entries).
 *
 * @throws {UsageError} On unknown flags, missing values or conflicting targets
 */
export function args_parse(argv: string[]): CliOptions {
    const options: CliOptions = {
        help: false,
        initConfig: false,
        configPath: DEFAULT_CONFIG_PATH,
        statePath: null,
        targets: null,
        overrides: [],
    };
    let sequenceId: string | null = null;
    let messageId: number | null = null;
    let listPath: string | null = null;

    for (let i: number = 0; i < argv.length; i++) {
        const arg: string = argv[i];
        const eq: number = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag: string = eq >= 0 ? arg.slice(0, eq) : arg;
        const inline: string | null = eq >= 0 ? arg.slice(eq + 1) : null;

        const value_take = (): string => {
            if (inline !== null) {
                if (inline === '') throw new UsageError(`Missing value after ${flag}`);
                return inline;
            }
            const next: string | undefined = argv[i + 1];
            if (next === undefined || next.startsWith('--')) {
                throw new UsageError(`Missing value after ${flag}`);
            }
            i++;
            return next;
        };

        if (own_has(SWITCH_OVERRIDES, flag)) {
            if (inline !== null) throw new UsageError(`${flag} takes no value`);
            options.overrides.push(SWITCH_OVERRIDES[flag]);
            continue;
        }
        if (own_has(VALUE_OVERRIDES, flag)) {
            options.overrides.push([VALUE_OVERRIDES[flag], value_take()]);
            continue;
        }

        switch (flag) {
            case '-h':
            case '--help':
                options.help = true;
                break;
            case '--init-config':
                options.initConfig = true;
                break;
            case '--config':
                options.configPath = value_take();
                break;
            case '--state':
                options.statePath = value_take();
                break;
            case '--list':
                listPath = value_take();
                break;
            case '--sequence':
                sequenceId = value_take();
                break;
            case '--message': {
                const raw: string = value_take();
                if (!/^\d+$/.test(raw)) throw new UsageError(`Invalid --message value: ${raw}`);
                messageId = Number(raw);
                break;
            }
            default:
                throw new UsageError(`Unknown argument: ${arg}`);
        }
    }

    if (listPath !== null && (sequenceId !== null || messageId !== null)) {
        throw new UsageError('Use either --list or --sequence/--message, not both');
    }
    if ((sequenceId === null) !== (messageId === null)) {
        throw new UsageError('--sequence and --message must be given together');
    }
    if (listPath !== null) {
        options.targets = { kind: 'list', path: listPath };
    } else if (sequenceId !== null && messageId !== null) {
        options.targets = { kind: 'single', address: { sequenceId, messageId } };
    }

    if (!options.help && !options.initConfig && options.targets === null) {
        throw new UsageError('Provide --sequence and --message, or --list <file>');
    }
    return options;
}

function own_has(table: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(table, key);
}
