#!/usr/bin/env node
/**
 * @file lineforge CLI
 *
 * Generates alternative phrasings for dialogue lines.
 *
 * Usage:
 *   npm run generate -- --sequence checkin --message 4 --state examples/state.yaml
 *   npm run generate -- --list examples/targets.txt --write
 *
 * @module cli
 */

import { errorMessage_resolve } from '../core/errors.js';
import { FsBackend } from '../store/backend/fs.js';
import { cli_run } from './run.js';

cli_run(process.argv.slice(2), {
    backend: new FsBackend(process.cwd()),
    env: process.env,
    out: (line: string): void => console.log(line),
    err: (line: string): void => console.error(line),
}).then(
    (code: number): void => {
        process.exitCode = code;
    },
    (error: unknown): void => {
        console.error(`>> ERROR: ${errorMessage_resolve(error)}`);
        process.exitCode = 1;
    },
);
