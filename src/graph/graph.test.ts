/**
 * @file Dialogue Graph Tests
 *
 * Sequence parsing, the sequence index cache, path resolution and the
 * context window, against in-memory sequence documents.
 *
 * @module graph
 */

import { describe, it, expect } from 'vitest';
import { MemoryBackend } from '../store/backend/memory.js';
import { StructuralError } from '../core/errors.js';
import { stateSpec_default, type ChoiceDirective, type StateSpec } from '../state/stateSpec.js';
import { sequence_parse, nodeKind_derive } from './parser/sequence.js';
import { FileSequenceSource, SequenceIndex, type SequenceSource } from './SequenceIndex.js';
import { path_resolve, route_select } from './resolver.js';
import { contextWindow_build, contextSamples_attach, CHOICE_PLACEHOLDER } from './context.js';
import {
    address_format,
    address_parse,
    type ContextTurn,
    type DialogueNode,
    type NodeAddress,
    type PathResolution,
    type ResolvedPathNode,
    type SequenceTable,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Fixtures
// ═══════════════════════════════════════════════════════════════════

const LINEAR = {
    sequenceId: 'linear',
    messages: [1, 2, 3, 4, 5].map((id: number) => ({ id, text: `Line ${id}` })),
};

const CHOICES = {
    sequenceId: 'choices',
    messages: [
        { id: 1, text: 'Pick one' },
        {
            id: 2,
            type: 'choice',
            choices: [
                { text: 'Walk', nextMessageId: 3 },
                { text: 'Run', nextMessageId: 10, contentKey: 'user.choose.run' },
                { text: 'Rest', nextMessageId: 20 },
            ],
        },
        { id: 3, text: 'Nice and easy' },
        { id: 4, text: 'Almost there', nextMessageId: 10 },
        { id: 10, text: 'Great choice', contentKey: 'bot.respond.choice.great' },
        { id: 20, text: 'Take a breath' },
        { id: 21, text: 'And another' },
        { id: 22, text: 'Ready?', nextMessageId: 10 },
    ],
};

const HUB = {
    sequenceId: 'hub',
    messages: [
        { id: 1, text: 'Welcome back', contentKey: 'bot.greet.return' },
        {
            id: 2,
            type: 'autoroute',
            routes: [
                { condition: 'user.streak >= 3', sequenceId: 'streak' },
                { condition: 'user.isNew == true', nextMessageId: 5 },
                { default: true, nextMessageId: 4 },
            ],
        },
        { id: 4, text: "Let's get started", nextMessageId: 9 },
        { id: 5, text: 'New here?' },
    ],
};

const STREAK_YAML = [
    'sequenceId: streak',
    'entryMessageId: 3',
    'messages:',
    '  - id: 3',
    '    text: Streak!',
    '    contentKey: bot.celebrate.streak',
    '  - id: 4',
    '    type: dataAction',
    '  - id: 5',
    '    text: Keep it going',
    '    contentKey: bot.celebrate.streak.long',
].join('\n');

const JUMP = {
    sequenceId: 'jump',
    messages: [{ id: 1, text: 'Switching over', sequenceId: 'streak' }],
};

const FORK = {
    sequenceId: 'fork',
    messages: [
        {
            id: 1,
            type: 'choice',
            choices: [
                { text: 'Left', nextMessageId: 2 },
                { text: 'Right', nextMessageId: 3 },
            ],
        },
        { id: 2, text: 'Left path', nextMessageId: 4 },
        { id: 3, text: 'Right path', nextMessageId: 4 },
        { id: 4, text: 'Paths meet', nextMessageId: 5 },
        { id: 5, text: 'Done', contentKey: 'bot.finish.fork' },
    ],
};

const LAST_OPTION = {
    sequenceId: 'last',
    messages: [
        {
            id: 1,
            type: 'choice',
            choices: [
                { text: 'One', nextMessageId: 2 },
                { text: 'Two', nextMessageId: 3 },
                { text: 'Three', nextMessageId: 4 },
            ],
        },
        { id: 2, text: 'First' },
        { id: 3, text: 'Second' },
        { id: 4, text: 'Third', contentKey: 'bot.pick.third' },
    ],
};

function backend_create(): MemoryBackend {
    return new MemoryBackend({
        'sequences/linear.json': JSON.stringify(LINEAR),
        'sequences/choices.json': JSON.stringify(CHOICES),
        'sequences/hub.json': JSON.stringify(HUB),
        'sequences/streak.yaml': STREAK_YAML,
        'sequences/jump.json': JSON.stringify(JUMP),
        'sequences/fork.json': JSON.stringify(FORK),
        'sequences/last.json': JSON.stringify(LAST_OPTION),
    });
}

function index_create(backend: MemoryBackend = backend_create()): SequenceIndex {
    return new SequenceIndex(new FileSequenceSource(backend, 'sequences'));
}

function state_create(sequenceId: string, overrides: Partial<StateSpec> = {}): StateSpec {
    return { ...stateSpec_default(sequenceId), ...overrides };
}

function ids(resolution: PathResolution): string[] {
    return resolution.path.map((n: ResolvedPathNode): string => address_format(n));
}

function target(raw: string): NodeAddress {
    const address: NodeAddress | null = address_parse(raw);
    if (!address) throw new Error(`bad test address ${raw}`);
    return address;
}

// ═══════════════════════════════════════════════════════════════════
// Sequence Parsing
// ═══════════════════════════════════════════════════════════════════

describe('graph/parser/sequence', (): void => {
    it('derives node kinds from document types', (): void => {
        expect(nodeKind_derive('choice', 's')).toBe('choice');
        expect(nodeKind_derive('autoroute', 's')).toBe('conditional-branch');
        expect(nodeKind_derive('dataAction', 's')).toBe('action');
        expect(nodeKind_derive('bot', 's', 'other')).toBe('cross-jump');
        expect(nodeKind_derive('bot', 's', 's')).toBe('message');
        expect(nodeKind_derive('textInput', 's')).toBe('message');
    });

    it('builds the node table with defaults', (): void => {
        const table: SequenceTable = sequence_parse(JSON.stringify(CHOICES), 'json');
        expect(table.entryMessageId).toBe(1);
        expect(table.order).toEqual([1, 2, 3, 4, 10, 20, 21, 22]);

        const choice: DialogueNode | undefined = table.nodes.get(2);
        expect(choice?.kind).toBe('choice');
        expect(choice?.sender).toBe('user');
        expect(choice?.choices[1]).toEqual({ text: 'Run', nextMessageId: 10, contentKey: 'user.choose.run' });

        expect(table.nodes.get(1)).toEqual({
            sequenceId: 'choices',
            id: 1,
            kind: 'message',
            type: 'bot',
            sender: 'bot',
            text: 'Pick one',
            choices: [],
            routes: [],
        });
    });

    it('parses YAML documents and honours entryMessageId', (): void => {
        const table: SequenceTable = sequence_parse(STREAK_YAML, 'yaml');
        expect(table.entryMessageId).toBe(3);
        expect(table.nodes.get(4)?.kind).toBe('action');
    });

    it('records cross-jump targets', (): void => {
        const table: SequenceTable = sequence_parse(JSON.stringify(JUMP), 'json');
        expect(table.nodes.get(1)).toMatchObject({ kind: 'cross-jump', targetSequenceId: 'streak' });
    });

    it('rejects duplicate ids, missing entries and schema violations', (): void => {
        const duplicate = { sequenceId: 'd', messages: [{ id: 1 }, { id: 1 }] };
        expect(() => sequence_parse(JSON.stringify(duplicate), 'json', 'd.json'))
            .toThrow('Invalid sequence d.json: duplicate message id 1');

        const badEntry = { sequenceId: 'e', entryMessageId: 7, messages: [{ id: 1 }] };
        expect(() => sequence_parse(JSON.stringify(badEntry), 'json', 'e.json'))
            .toThrow('Invalid sequence e.json: entry message 7 does not exist');

        const noId = { sequenceId: 'f', messages: [{ text: 'hi' }] };
        expect(() => sequence_parse(JSON.stringify(noId), 'json')).toThrow(StructuralError);
        expect(() => sequence_parse('{ nope', 'json')).toThrow('cannot parse json');
    });
});

// ═══════════════════════════════════════════════════════════════════
// Sequence Index
// ═══════════════════════════════════════════════════════════════════

describe('graph/SequenceIndex', (): void => {
    it('loads each sequence once and caches absence', async (): Promise<void> => {
        const loads: string[] = [];
        const inner: FileSequenceSource = new FileSequenceSource(backend_create(), 'sequences');
        const counting: SequenceSource = {
            sequence_load: (id: string): Promise<SequenceTable | null> => {
                loads.push(id);
                return inner.sequence_load(id);
            },
        };
        const index: SequenceIndex = new SequenceIndex(counting);

        expect((await index.node_find({ sequenceId: 'linear', messageId: 3 }))?.text).toBe('Line 3');
        expect(await index.node_find({ sequenceId: 'linear', messageId: 4 })).not.toBeNull();
        expect(await index.node_find({ sequenceId: 'ghost', messageId: 1 })).toBeNull();
        expect(await index.entry_get('ghost')).toBeNull();

        expect(loads).toEqual(['linear', 'ghost']);
    });

    it('peeks only at loaded sequences', async (): Promise<void> => {
        const index: SequenceIndex = index_create();
        expect(index.node_peek({ sequenceId: 'hub', messageId: 1 })).toBeNull();
        await index.sequence_get('hub');
        expect(index.node_peek({ sequenceId: 'hub', messageId: 1 })?.contentKey).toBe('bot.greet.return');
    });

    it('resolves entry nodes', async (): Promise<void> => {
        const index: SequenceIndex = index_create();
        expect(await index.entry_get('streak')).toEqual({ sequenceId: 'streak', messageId: 3 });
        expect(await index.entry_get('linear')).toEqual({ sequenceId: 'linear', messageId: 1 });
    });

    it('rejects a document that declares a different sequence id', async (): Promise<void> => {
        const backend: MemoryBackend = new MemoryBackend({
            'sequences/alias.json': JSON.stringify({ sequenceId: 'other', messages: [{ id: 1 }] }),
        });
        await expect(index_create(backend).sequence_get('alias'))
            .rejects.toThrow('Invalid sequence sequences/alias.json: declares sequenceId "other"');
    });

    it('treats path-like ids as missing', async (): Promise<void> => {
        expect(await index_create().sequence_get('../secrets')).toBeNull();
    });
});

// ═══════════════════════════════════════════════════════════════════
// Path Resolution
// ═══════════════════════════════════════════════════════════════════

describe('graph/resolver', (): void => {
    it('follows a linear chain', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(index_create(), state_create('linear'), target('linear:5'));
        expect(ids(result)).toEqual(['linear:1', 'linear:2', 'linear:3', 'linear:4', 'linear:5']);
        expect(result.fellBack).toBe(false);
        expect(result.path.every((n: ResolvedPathNode): boolean => n.kind === 'message')).toBe(true);
    });

    it('finds the choice option that reaches the target soonest', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(index_create(), state_create('choices'), target('choices:10'));
        expect(ids(result)).toEqual(['choices:1', 'choices:2', 'choices:10']);
        expect(result.path[1].kind).toBe('choice');
        expect(result.path[2].selection).toEqual({ index: 1, text: 'Run', contentKey: 'user.choose.run' });
    });

    it('follows a directive pinned by index', async (): Promise<void> => {
        const directives: ChoiceDirective[] = [
            { sequenceId: 'choices', messageId: 2, method: 'index', value: 0 },
        ];
        const result: PathResolution = await path_resolve(
            index_create(), state_create('choices', { directives }), target('choices:10'),
        );
        expect(ids(result)).toEqual(['choices:1', 'choices:2', 'choices:3', 'choices:4', 'choices:10']);
        expect(result.path[2].selection).toEqual({ index: 0, text: 'Walk' });
    });

    it('follows directives by text and by content key', async (): Promise<void> => {
        const byText: PathResolution = await path_resolve(
            index_create(),
            state_create('choices', { directives: [{ sequenceId: 'choices', messageId: 2, method: 'text', value: 'Rest' }] }),
            target('choices:10'),
        );
        expect(ids(byText)).toEqual([
            'choices:1', 'choices:2', 'choices:20', 'choices:21', 'choices:22', 'choices:10',
        ]);

        const byKey: PathResolution = await path_resolve(
            index_create(),
            state_create('choices', {
                directives: [{ sequenceId: 'choices', messageId: 2, method: 'content-key', value: 'user.choose.run' }],
            }),
            target('choices:10'),
        );
        expect(ids(byKey)).toEqual(['choices:1', 'choices:2', 'choices:10']);
    });

    it('explores every option when a directive index is out of range', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(
            index_create(),
            state_create('choices', { directives: [{ sequenceId: 'choices', messageId: 2, method: 'index', value: 7 }] }),
            target('choices:10'),
        );
        expect(result.fellBack).toBe(false);
        expect(ids(result)).toEqual(['choices:1', 'choices:2', 'choices:10']);
    });

    it('takes the first matching conditional route into another sequence', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(
            index_create(),
            state_create('hub', { variables: { 'user.streak': 5 } }),
            target('streak:5'),
        );
        expect(ids(result)).toEqual(['hub:1', 'hub:2', 'streak:3', 'streak:4', 'streak:5']);
        expect(result.path.map((n: ResolvedPathNode): string => n.kind)).toEqual([
            'message', 'conditional-branch', 'message', 'action', 'message',
        ]);
    });

    it('uses later routes and the default route', async (): Promise<void> => {
        const isNew: PathResolution = await path_resolve(
            index_create(), state_create('hub', { variables: { 'user.isNew': true } }), target('hub:5'),
        );
        expect(ids(isNew)).toEqual(['hub:1', 'hub:2', 'hub:5']);

        const plain: PathResolution = await path_resolve(index_create(), state_create('hub'), target('hub:4'));
        expect(ids(plain)).toEqual(['hub:1', 'hub:2', 'hub:4']);
    });

    it('ignores conditions in default branch mode', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(
            index_create(),
            state_create('hub', { branchMode: 'default', variables: { 'user.streak': 5 } }),
            target('streak:5'),
        );
        expect(result.fellBack).toBe(true);
        expect(result.path).toEqual([{ sequenceId: 'streak', messageId: 5, kind: 'message' }]);
    });

    it('jumps to another sequence entry from a cross-jump node', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(index_create(), state_create('jump'), target('streak:5'));
        expect(ids(result)).toEqual(['jump:1', 'streak:3', 'streak:4', 'streak:5']);
        expect(result.path[0].kind).toBe('cross-jump');
    });

    it('starts from an explicit entry node', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(
            index_create(),
            state_create('linear', { entry: { sequenceId: 'linear', messageId: 3 } }),
            target('linear:5'),
        );
        expect(ids(result)).toEqual(['linear:3', 'linear:4', 'linear:5']);
    });

    it('honours the depth limit in edges', async (): Promise<void> => {
        const shallow: PathResolution = await path_resolve(
            index_create(), state_create('linear', { limits: { maxDepth: 3, maxPaths: 100 } }), target('linear:5'),
        );
        expect(shallow.fellBack).toBe(true);

        const exact: PathResolution = await path_resolve(
            index_create(), state_create('linear', { limits: { maxDepth: 4, maxPaths: 100 } }), target('linear:5'),
        );
        expect(exact.fellBack).toBe(false);
    });

    it('stops enqueueing at the path limit', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(
            index_create(), state_create('choices', { limits: { maxDepth: 50, maxPaths: 2 } }), target('choices:10'),
        );
        expect(result.fellBack).toBe(true);
        expect(ids(result)).toEqual(['choices:10']);
        expect(result.path[0].kind).toBe('message');
    });

    it('keeps both frontier entries into a shared node and expands it once', async (): Promise<void> => {
        const state: StateSpec = state_create('fork', { limits: { maxDepth: 50, maxPaths: 6 } });
        const result: PathResolution = await path_resolve(index_create(), state, target('fork:5'));
        expect(ids(result)).toEqual(['fork:1', 'fork:2', 'fork:4', 'fork:5']);
        expect(result.path[1].selection).toEqual({ index: 0, text: 'Left' });
        expect(result.expanded).toBe(4);

        // The second entry into fork:4 spends the last path slot.
        const tight: StateSpec = state_create('fork', { limits: { maxDepth: 50, maxPaths: 5 } });
        const starved: PathResolution = await path_resolve(index_create(), tight, target('fork:5'));
        expect(starved.fellBack).toBe(true);
        expect(starved.expanded).toBe(4);
    });

    it('dequeues a successor equal to the target before its siblings', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(index_create(), state_create('last'), target('last:4'));
        expect(ids(result)).toEqual(['last:1', 'last:4']);
        expect(result.path[1].selection).toEqual({ index: 2, text: 'Three' });
        expect(result.expanded).toBe(1);
    });

    it('falls back when the entry sequence is missing', async (): Promise<void> => {
        const result: PathResolution = await path_resolve(index_create(), state_create('ghost'), target('ghost:1'));
        expect(result).toEqual({
            path: [{ sequenceId: 'ghost', messageId: 1, kind: 'message' }],
            fellBack: true,
            expanded: 0,
        });
    });

    it('picks the first declared route when none match and none is default', (): void => {
        const state: StateSpec = state_create('x');
        const routes = [
            { condition: 'user.a == 1', nextMessageId: 3, isDefault: false },
            { condition: 'user.b == 1', nextMessageId: 4, isDefault: false },
        ];
        expect(route_select(routes, state)).toBe(routes[0]);
        expect(route_select([], state)).toBeNull();
    });
});

// ═══════════════════════════════════════════════════════════════════
// Context Window
// ═══════════════════════════════════════════════════════════════════

describe('graph/context', (): void => {
    async function window_build(
        state: StateSpec,
        to: string,
        historyTurns: number = 4,
    ): Promise<{ index: SequenceIndex; turns: ContextTurn[] }> {
        const index: SequenceIndex = index_create();
        const resolution: PathResolution = await path_resolve(index, state, target(to));
        const turns: ContextTurn[] = contextWindow_build(
            resolution.path,
            (address: NodeAddress): DialogueNode | null => index.node_peek(address),
            { historyTurns },
        );
        return { index, turns };
    }

    it('renders choice selections as user turns', async (): Promise<void> => {
        const { turns } = await window_build(state_create('choices'), 'choices:10');
        expect(turns).toEqual([
            { sequenceId: 'choices', messageId: 1, sender: 'bot', kind: 'message', reference: 'Pick one' },
            { sequenceId: 'choices', messageId: 2, sender: 'user', kind: 'choice', reference: 'contentKey:user.choose.run' },
        ]);
    });

    it('uses the option text when the option has no content key', async (): Promise<void> => {
        const directives: ChoiceDirective[] = [{ sequenceId: 'choices', messageId: 2, method: 'index', value: 0 }];
        const { turns } = await window_build(state_create('choices', { directives }), 'choices:10', 2);
        expect(turns.map((t: ContextTurn): string => t.reference)).toEqual(['Nice and easy', 'Almost there']);

        const { turns: wide } = await window_build(state_create('choices', { directives }), 'choices:10', 10);
        expect(wide.map((t: ContextTurn): string => t.reference)).toEqual([
            'Pick one', 'Walk', 'Nice and easy', 'Almost there',
        ]);
    });

    it('skips routing and action nodes', async (): Promise<void> => {
        const { turns } = await window_build(state_create('hub', { variables: { 'user.streak': 4 } }), 'streak:5');
        expect(turns.map((t: ContextTurn): string => t.reference)).toEqual([
            'contentKey:bot.greet.return',
            'contentKey:bot.celebrate.streak',
        ]);
    });

    it('falls back to a placeholder when no selection was recorded', (): void => {
        const choice: DialogueNode = {
            sequenceId: 's', id: 1, kind: 'choice', type: 'choice', sender: 'user', text: '',
            choices: [], routes: [],
        };
        const path: ResolvedPathNode[] = [
            { sequenceId: 's', messageId: 1, kind: 'choice' },
            { sequenceId: 's', messageId: 2, kind: 'message' },
        ];
        const turns: ContextTurn[] = contextWindow_build(path, (): DialogueNode => choice, { historyTurns: 3 });
        expect(turns).toEqual([
            { sequenceId: 's', messageId: 1, sender: 'user', kind: 'choice', reference: CHOICE_PLACEHOLDER },
        ]);
    });

    it('is empty for a single-node path or a zero window', async (): Promise<void> => {
        const { turns } = await window_build(state_create('ghost'), 'ghost:1');
        expect(turns).toEqual([]);
        const { turns: none } = await window_build(state_create('choices'), 'choices:10', 0);
        expect(none).toEqual([]);
    });

    it('attaches sample phrasings to content-key turns', async (): Promise<void> => {
        const backend: MemoryBackend = new MemoryBackend({
            'assets/content/bot/greet/return.txt': 'Hey again!\nWelcome back!\nGood to see you\n',
        });
        const turns: ContextTurn[] = [
            { sequenceId: 'hub', messageId: 1, sender: 'bot', kind: 'message', reference: 'contentKey:bot.greet.return' },
            { sequenceId: 'hub', messageId: 3, sender: 'bot', kind: 'message', reference: 'contentKey:bot.celebrate.streak' },
            { sequenceId: 'hub', messageId: 4, sender: 'bot', kind: 'message', reference: 'Plain text' },
        ];
        const sampled: ContextTurn[] = await contextSamples_attach(turns, backend, 'assets', 2);
        expect(sampled[0].examples).toEqual(['Hey again!', 'Welcome back!']);
        expect(sampled[1]).toEqual(turns[1]);
        expect(sampled[2]).toEqual(turns[2]);
    });
});
