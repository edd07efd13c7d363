/**
 * @file Context Window Builder
 *
 * Projects a resolved path onto the conversation a reader would have
 * seen just before the target line: the last N displayable turns,
 * excluding the target itself. Routing and action nodes are invisible.
 * A choice node becomes a user turn referencing the option that was
 * taken, read from the following path node's selection.
 *
 * @module graph
 */

import { corpus_readRaw } from '../content/exemplars.js';
import type { StorageBackend } from '../store/types.js';
import type {
    ChoiceSelection,
    ContextTurn,
    DialogueNode,
    NodeAddress,
    ResolvedPathNode,
} from './types.js';

export const CHOICE_PLACEHOLDER: string = '[user choice]';
export const CONTENT_KEY_PREFIX: string = 'contentKey:';

const NON_DISPLAYABLE_TYPES: ReadonlySet<string> = new Set(['autoroute', 'dataAction']);

export type NodeLookup = (address: NodeAddress) => DialogueNode | null;

export interface ContextWindowOptions {
    /** Maximum number of turns kept, most recent last. */
    historyTurns: number;
}

/**
 * Build the context window for the last node of `path`.
 */
export function contextWindow_build(
    path: ResolvedPathNode[],
    lookup: NodeLookup,
    options: ContextWindowOptions,
): ContextTurn[] {
    if (options.historyTurns <= 0) return [];

    const turns: ContextTurn[] = [];
    for (let i = 0; i < path.length - 1; i++) {
        const step: ResolvedPathNode = path[i];
        const node: DialogueNode | null = lookup(step);
        if (!node || NON_DISPLAYABLE_TYPES.has(node.type)) continue;

        const turn: ContextTurn | null = node.kind === 'choice'
            ? choiceTurn_build(node, path[i + 1].selection)
            : messageTurn_build(node);
        if (turn) turns.push(turn);
    }

    return turns.slice(-options.historyTurns);
}

/**
 * Attach up to `perTurn` existing phrasings to every turn that
 * references a content key.
 */
export async function contextSamples_attach(
    turns: ContextTurn[],
    backend: StorageBackend,
    assetsDir: string,
    perTurn: number,
): Promise<ContextTurn[]> {
    if (perTurn <= 0) return turns;

    const out: ContextTurn[] = [];
    for (const turn of turns) {
        if (!turn.reference.startsWith(CONTENT_KEY_PREFIX)) {
            out.push(turn);
            continue;
        }
        const key: string = turn.reference.slice(CONTENT_KEY_PREFIX.length);
        const examples: string[] = (await corpus_readRaw(backend, assetsDir, key)).slice(0, perTurn);
        out.push(examples.length > 0 ? { ...turn, examples } : turn);
    }
    return out;
}

function choiceTurn_build(node: DialogueNode, selection: ChoiceSelection | undefined): ContextTurn {
    let reference: string = CHOICE_PLACEHOLDER;
    if (selection?.contentKey) {
        reference = `${CONTENT_KEY_PREFIX}${selection.contentKey}`;
    } else if (selection && selection.text.trim() !== '') {
        reference = selection.text;
    }
    return {
        sequenceId: node.sequenceId,
        messageId: node.id,
        sender: 'user',
        kind: node.kind,
        reference,
    };
}

function messageTurn_build(node: DialogueNode): ContextTurn | null {
    const reference: string = node.contentKey
        ? `${CONTENT_KEY_PREFIX}${node.contentKey}`
        : node.text;
    if (reference.trim() === '') return null;

    return {
        sequenceId: node.sequenceId,
        messageId: node.id,
        sender: node.sender === 'user' ? 'user' : 'bot',
        kind: node.kind,
        reference,
    };
}
