/**
 * @file Path Resolver
 *
 * Breadth-first search from a state's entry node to a target node over
 * the multi-sequence dialogue graph. Queue entries are whole paths, so
 * the result needs no back-pointer reconstruction.
 *
 * Expansion by node kind:
 *
 * - cross-jump: the target sequence's entry node.
 * - conditional-branch: the first matching route in `resolve` mode,
 *   else the default route, else the first route.
 * - choice: the option pinned by a directive for this node, or every
 *   option in parallel (each tagged with its selection) when there is no
 *   directive or it matches nothing.
 * - message/action: the explicit next node, else id + 1 in the same
 *   sequence.
 *
 * Nodes are marked visited after expansion, so a node reached twice in
 * the same layer is expanded once. Paths deeper than `maxDepth` edges
 * are discarded on dequeue. When the target is unreachable the result
 * is the single target node with `fellBack` set.
 *
 * @module graph
 */

import { condition_evaluate } from '../expr/evaluator.js';
import type { ChoiceDirective, StateSpec } from '../state/stateSpec.js';
import type { SequenceIndex } from './SequenceIndex.js';
import {
    address_equals,
    address_format,
    type ChoiceOption,
    type ChoiceSelection,
    type DialogueNode,
    type NodeAddress,
    type NodeKind,
    type PathResolution,
    type ResolvedPathNode,
    type RouteCondition,
} from './types.js';

interface Successor {
    address: NodeAddress;
    selection?: ChoiceSelection;
}

/**
 * Resolve a path from the state's entry node to `target`.
 */
export async function path_resolve(
    index: SequenceIndex,
    state: StateSpec,
    target: NodeAddress,
): Promise<PathResolution> {
    const start: ResolvedPathNode | null = await start_resolve(index, state);
    if (!start) return fallback_build(index, target, 0);

    const queue: ResolvedPathNode[][] = [[start]];
    const visited: Set<string> = new Set();
    let head: number = 0;
    let enqueued: number = 1;
    let expanded: number = 0;

    while (head < queue.length) {
        const path: ResolvedPathNode[] = queue[head];
        head++;

        if (path.length - 1 > state.limits.maxDepth) continue;

        const last: ResolvedPathNode = path[path.length - 1];
        if (address_equals(last, target)) {
            return { path, fellBack: false, expanded };
        }

        const key: string = address_format(last);
        if (visited.has(key)) continue;

        const node: DialogueNode | null = await index.node_find(last);
        if (!node) {
            visited.add(key);
            continue;
        }

        const successors: ResolvedPathNode[] = await successors_resolve(index, state, node, target);
        expanded++;
        for (const successor of successors) {
            if (enqueued >= state.limits.maxPaths) break;
            queue.push([...path, successor]);
            enqueued++;
        }
        visited.add(key);
    }

    return fallback_build(index, target, expanded);
}

/**
 * Successors of one node under the given state, target-first, with
 * missing nodes dropped.
 */
export async function successors_resolve(
    index: SequenceIndex,
    state: StateSpec,
    node: DialogueNode,
    target: NodeAddress,
): Promise<ResolvedPathNode[]> {
    const raw: Successor[] = await successors_expand(index, state, node);

    const resolved: ResolvedPathNode[] = [];
    for (const successor of raw) {
        const next: DialogueNode | null = await index.node_find(successor.address);
        if (!next) continue;
        resolved.push(pathNode_build(successor.address, next.kind, successor.selection));
    }

    // Stable: an exact hit on the target goes first.
    const hits: ResolvedPathNode[] = resolved.filter((n: ResolvedPathNode): boolean => address_equals(n, target));
    const rest: ResolvedPathNode[] = resolved.filter((n: ResolvedPathNode): boolean => !address_equals(n, target));
    return [...hits, ...rest];
}

// ─── Expansion ──────────────────────────────────────────────────

async function successors_expand(index: SequenceIndex, state: StateSpec, node: DialogueNode): Promise<Successor[]> {
    switch (node.kind) {
        case 'cross-jump': {
            const entry: NodeAddress | null = node.targetSequenceId === undefined
                ? null
                : await index.entry_get(node.targetSequenceId);
            return entry ? [{ address: entry }] : [];
        }
        case 'conditional-branch': {
            const route: RouteCondition | null = route_select(node.routes, state);
            if (!route) return linear_successor(node);
            const address: NodeAddress | null = await destination_resolve(index, node, route);
            return address ? [{ address }] : [];
        }
        case 'choice':
            return choice_expand(index, state, node);
        case 'action':
        case 'message':
            return linear_successor(node);
        default: {
            const unreachable: never = node.kind;
            return unreachable;
        }
    }
}

/**
 * Pick the route a conditional branch takes. Null only when the node
 * declares no routes.
 */
export function route_select(routes: RouteCondition[], state: StateSpec): RouteCondition | null {
    if (routes.length === 0) return null;

    if (state.branchMode === 'resolve') {
        const matched: RouteCondition | undefined = routes.find((route: RouteCondition): boolean =>
            !route.isDefault
            && route.condition !== undefined
            && route.condition.trim() !== ''
            && condition_evaluate(route.condition, state.variables),
        );
        if (matched) return matched;
    }

    return routes.find((route: RouteCondition): boolean => route.isDefault) ?? routes[0];
}

async function choice_expand(index: SequenceIndex, state: StateSpec, node: DialogueNode): Promise<Successor[]> {
    const pinned: number = directive_apply(state.directives, node);
    const picks: number[] = pinned >= 0
        ? [pinned]
        : node.choices.map((_option: ChoiceOption, i: number): number => i);

    const out: Successor[] = [];
    for (const i of picks) {
        const option: ChoiceOption = node.choices[i];
        const address: NodeAddress | null = await destination_resolve(index, node, option);
        if (!address) continue;
        const selection: ChoiceSelection = { index: i, text: option.text };
        if (option.contentKey !== undefined) selection.contentKey = option.contentKey;
        out.push({ address, selection });
    }
    return out;
}

/**
 * Index of the option a directive pins at this node, or -1 when no
 * directive applies or the first applicable one matches nothing.
 */
export function directive_apply(directives: ChoiceDirective[], node: DialogueNode): number {
    const directive: ChoiceDirective | undefined = directives.find((d: ChoiceDirective): boolean =>
        d.sequenceId === node.sequenceId && d.messageId === node.id,
    );
    if (!directive) return -1;

    switch (directive.method) {
        case 'index':
            return directive.value >= 0 && directive.value < node.choices.length ? directive.value : -1;
        case 'text':
            return node.choices.findIndex((o: ChoiceOption): boolean => o.text === directive.value);
        case 'content-key':
            return node.choices.findIndex((o: ChoiceOption): boolean => o.contentKey === directive.value);
    }
}

/**
 * Where a route or option leads: another sequence's entry node, an
 * explicit node in this sequence, or this node's linear successor.
 */
async function destination_resolve(
    index: SequenceIndex,
    node: DialogueNode,
    edge: { sequenceId?: string; nextMessageId?: number },
): Promise<NodeAddress | null> {
    if (edge.sequenceId !== undefined) {
        return index.entry_get(edge.sequenceId);
    }
    if (edge.nextMessageId !== undefined) {
        return { sequenceId: node.sequenceId, messageId: edge.nextMessageId };
    }
    return linear_successor(node)[0]?.address ?? null;
}

function linear_successor(node: DialogueNode): Successor[] {
    return [{
        address: { sequenceId: node.sequenceId, messageId: node.nextMessageId ?? node.id + 1 },
    }];
}

// ─── Helpers ────────────────────────────────────────────────────

async function start_resolve(index: SequenceIndex, state: StateSpec): Promise<ResolvedPathNode | null> {
    const address: NodeAddress | null = state.entry.messageId === undefined
        ? await index.entry_get(state.entry.sequenceId)
        : { sequenceId: state.entry.sequenceId, messageId: state.entry.messageId };
    if (!address) return null;

    const node: DialogueNode | null = await index.node_find(address);
    return node ? pathNode_build(address, node.kind) : null;
}

async function fallback_build(index: SequenceIndex, target: NodeAddress, expanded: number): Promise<PathResolution> {
    const node: DialogueNode | null = await index.node_find(target);
    return {
        path: [pathNode_build(target, node?.kind ?? 'message')],
        fellBack: true,
        expanded,
    };
}

function pathNode_build(address: NodeAddress, kind: NodeKind, selection?: ChoiceSelection): ResolvedPathNode {
    const out: ResolvedPathNode = { sequenceId: address.sequenceId, messageId: address.messageId, kind };
    if (selection) out.selection = selection;
    return out;
}
