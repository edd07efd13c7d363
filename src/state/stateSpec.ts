/**
 * @file State Specification
 *
 * The hypothetical user state a path is resolved under: where the walk
 * starts, how conditional branches are decided, the variables routing
 * conditions see, which choice options are pinned, and search limits.
 *
 * Documents are written in the configuration subset (or JSON):
 *
 *   entry: onboarding:1
 *   branch_mode: resolve
 *   variables:
 *     user:
 *       streak: 3
 *     task.current: walk
 *   choices:
 *     - node: onboarding:4
 *       by: index
 *       value: 1
 *   limits:
 *     max_depth: 40
 *
 * Nested variable maps are flattened to dotted keys.
 *
 * @module state
 */

import { z } from 'zod';
import { StructuralError } from '../core/errors.js';
import { address_parse, type NodeAddress } from '../graph/types.js';
import { document_parse } from '../tree/parser.js';
import { tree_toPlain } from '../tree/convert.js';
import type { PlainValue } from '../tree/types.js';

// ─── Types ──────────────────────────────────────────────────────

export type Scalar = string | number | boolean | null;

/** `resolve` evaluates route conditions; `default` always takes the default route. */
export type BranchMode = 'resolve' | 'default';

export type ChoiceDirective =
    | (NodeAddress & { method: 'index'; value: number })
    | (NodeAddress & { method: 'text'; value: string })
    | (NodeAddress & { method: 'content-key'; value: string });

export type SelectionMethod = ChoiceDirective['method'];

export interface TraversalLimits {
    /** Maximum number of edges in a path. */
    maxDepth: number;
    /** Maximum number of paths ever enqueued during a search. */
    maxPaths: number;
}

export interface StateSpec {
    entry: { sequenceId: string; messageId?: number };
    branchMode: BranchMode;
    variables: Record<string, Scalar>;
    directives: ChoiceDirective[];
    limits: TraversalLimits;
}

export const DEFAULT_LIMITS: TraversalLimits = { maxDepth: 200, maxPaths: 10000 };

// ─── Schemas ────────────────────────────────────────────────────

interface VariableTree {
    [key: string]: Scalar | VariableTree;
}

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const VariableTreeSchema: z.ZodType<VariableTree> = z.lazy(
    () => z.record(z.string(), z.union([ScalarSchema, VariableTreeSchema])),
);

const AddressSchema = z.string().refine(
    (raw: string): boolean => address_parse(raw) !== null,
    'expected "sequence:message"',
);

const EntrySchema = z.union([
    z.string().min(1),
    z.object({
        sequence: z.string().min(1),
        message:  z.number().int().nonnegative().optional()
    })
]);

const DirectiveSchema = z.discriminatedUnion('by', [
    z.object({ node: AddressSchema, by: z.literal('index'),       value: z.number().int() }),
    z.object({ node: AddressSchema, by: z.literal('text'),        value: z.string() }),
    z.object({ node: AddressSchema, by: z.literal('content-key'), value: z.string().min(1) })
]);

export const StateSpecSchema = z.object({
    entry:       EntrySchema.optional(),
    branch_mode: z.enum(['resolve', 'default']).default('resolve'),
    variables:   VariableTreeSchema.default({}),
    choices:     z.array(DirectiveSchema).default([]),
    limits: z.object({
        max_depth: z.number().int().positive().default(DEFAULT_LIMITS.maxDepth),
        max_paths: z.number().int().positive().default(DEFAULT_LIMITS.maxPaths)
    }).default({})
});

export type RawStateSpec = z.infer<typeof StateSpecSchema>;

// ─── Construction ───────────────────────────────────────────────

/**
 * The state used when no specification is given: start at the target
 * sequence's entry node, resolve branches, no variables or directives.
 */
export function stateSpec_default(sequenceId: string): StateSpec {
    return {
        entry: { sequenceId },
        branchMode: 'resolve',
        variables: {},
        directives: [],
        limits: { ...DEFAULT_LIMITS },
    };
}

/**
 * Parse a state specification document.
 *
 * @param text - Document text (configuration subset or JSON)
 * @param fallbackSequenceId - Entry sequence when the document names none
 * @throws {StructuralError} On syntax or schema errors
 */
export function stateSpec_parse(text: string, fallbackSequenceId: string, source: string = '<state>'): StateSpec {
    return stateSpec_fromPlain(tree_toPlain(document_parse(text)), fallbackSequenceId, source);
}

/**
 * Validate an already-parsed specification.
 *
 * @throws {StructuralError} On schema errors
 */
export function stateSpec_fromPlain(raw: PlainValue, fallbackSequenceId: string, source: string = '<state>'): StateSpec {
    const result = StateSpecSchema.safeParse(raw);
    if (!result.success) {
        const issues: string = result.error.issues
            .map((i): string => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new StructuralError(`Invalid state specification ${source}: ${issues}`);
    }
    const doc: RawStateSpec = result.data;

    return {
        entry: entry_normalize(doc.entry, fallbackSequenceId),
        branchMode: doc.branch_mode,
        variables: variables_flatten(doc.variables),
        directives: doc.choices.map(directive_build),
        limits: { maxDepth: doc.limits.max_depth, maxPaths: doc.limits.max_paths },
    };
}

/**
 * Flatten nested variable maps into dotted keys. An explicit dotted key
 * wins over the same path reached through nesting.
 */
export function variables_flatten(tree: VariableTree, prefix: string = ''): Record<string, Scalar> {
    const nested: Record<string, Scalar> = {};
    const direct: Record<string, Scalar> = {};
    for (const [key, value] of Object.entries(tree)) {
        const path: string = prefix === '' ? key : `${prefix}.${key}`;
        if (value !== null && typeof value === 'object') {
            Object.assign(nested, variables_flatten(value, path));
        } else {
            direct[path] = value;
        }
    }
    return { ...nested, ...direct };
}

function entry_normalize(entry: RawStateSpec['entry'], fallbackSequenceId: string): StateSpec['entry'] {
    if (entry === undefined) return { sequenceId: fallbackSequenceId };
    if (typeof entry !== 'string') {
        return entry.message === undefined
            ? { sequenceId: entry.sequence }
            : { sequenceId: entry.sequence, messageId: entry.message };
    }
    const address: NodeAddress | null = address_parse(entry);
    return address ?? { sequenceId: entry.trim() };
}

function directive_build(raw: RawStateSpec['choices'][number]): ChoiceDirective {
    const address: NodeAddress | null = address_parse(raw.node);
    if (!address) {
        throw new StructuralError(`Invalid choice directive node "${raw.node}"`);
    }
    switch (raw.by) {
        case 'index':       return { ...address, method: 'index', value: raw.value };
        case 'text':        return { ...address, method: 'text', value: raw.value };
        case 'content-key': return { ...address, method: 'content-key', value: raw.value };
    }
}
