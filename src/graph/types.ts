/**
 * @file Dialogue Graph Type Definitions
 *
 * The dialogue graph spans several sequence documents. Nodes are keyed
 * by (sequence id, message id) and owned by the SequenceIndex cache;
 * edges are plain addresses, never object references, so sequences can
 * point at each other without being loaded together.
 *
 * @module graph
 */

// ─── Addresses ──────────────────────────────────────────────────

export interface NodeAddress {
    sequenceId: string;
    messageId: number;
}

/** Canonical `sequence:message` form of an address. */
export function address_format(address: NodeAddress): string {
    return `${address.sequenceId}:${address.messageId}`;
}

export function address_equals(a: NodeAddress, b: NodeAddress): boolean {
    return a.sequenceId === b.sequenceId && a.messageId === b.messageId;
}

/**
 * Parse `sequence:message`. Returns null unless the message part is a
 * non-negative integer and the sequence part is non-empty.
 */
export function address_parse(raw: string): NodeAddress | null {
    const match: RegExpExecArray | null = /^\s*([^:\s]+)\s*:\s*(\d+)\s*$/.exec(raw);
    if (!match) return null;
    return { sequenceId: match[1], messageId: Number.parseInt(match[2], 10) };
}

// ─── Nodes ──────────────────────────────────────────────────────

/**
 * Routing behaviour of a node, derived from its document `type`:
 * `choice` → choice, `autoroute` → conditional-branch, `dataAction` →
 * action, anything declaring a different owning sequence → cross-jump,
 * everything else → message.
 */
export type NodeKind = 'message' | 'choice' | 'conditional-branch' | 'action' | 'cross-jump';

/**
 * One user-selectable option of a choice node.
 */
export interface ChoiceOption {
    text: string;
    nextMessageId?: number;
    sequenceId?: string;
    contentKey?: string;
    value?: unknown;
}

/**
 * One route of a conditional-branch node. Routes without a condition
 * only match as the default or first-declared fallback.
 */
export interface RouteCondition {
    condition?: string;
    nextMessageId?: number;
    sequenceId?: string;
    isDefault: boolean;
}

/**
 * @property type - Display type from the document (`bot`, `user`, `choice`, `textInput`, ...)
 * @property sender - Who speaks the line
 * @property targetSequenceId - Set on cross-jump nodes
 */
export interface DialogueNode {
    sequenceId: string;
    id: number;
    kind: NodeKind;
    type: string;
    sender: string;
    text: string;
    contentKey?: string;
    nextMessageId?: number;
    targetSequenceId?: string;
    choices: ChoiceOption[];
    routes: RouteCondition[];
}

/**
 * Parsed sequence document: the node table plus document order.
 */
export interface SequenceTable {
    sequenceId: string;
    name: string;
    description: string;
    entryMessageId: number;
    nodes: Map<number, DialogueNode>;
    order: number[];
}

// ─── Resolution ─────────────────────────────────────────────────

/**
 * The option taken at a choice node to reach the following path node.
 */
export interface ChoiceSelection {
    index: number;
    text: string;
    contentKey?: string;
}

/**
 * One step of a resolved path. `selection` is set when the preceding
 * node was a choice.
 */
export interface ResolvedPathNode {
    sequenceId: string;
    messageId: number;
    kind: NodeKind;
    selection?: ChoiceSelection;
}

/**
 * Result of path resolution. `fellBack` marks the degenerate
 * single-node path returned when the target could not be reached.
 */
export interface PathResolution {
    path: ResolvedPathNode[];
    fellBack: boolean;
    /** Nodes expanded during the search. */
    expanded: number;
}

// ─── Context ────────────────────────────────────────────────────

export type TurnSender = 'bot' | 'user';

/**
 * One displayable turn of conversation history before the target.
 * `reference` is either literal text or `contentKey:<key>`.
 */
export interface ContextTurn {
    sequenceId: string;
    messageId: number;
    sender: TurnSender;
    kind: NodeKind;
    reference: string;
    examples?: string[];
}
