/**
 * @file Sequence Document Parser
 *
 * Parses one sequence document (JSON or YAML) into a SequenceTable. The
 * document is validated against `SequenceDocumentSchema` at the boundary
 * before any field access.
 *
 * @module graph/parser
 */

import yaml from 'js-yaml';
import { StructuralError } from '../../core/errors.js';
import type { ChoiceOption, DialogueNode, NodeKind, RouteCondition, SequenceTable } from '../types.js';
import { SequenceDocumentSchema, type RawMessage } from './schemas.js';

export type SequenceFormat = 'json' | 'yaml';

/**
 * Parse a sequence document.
 *
 * @param text - Raw document text
 * @param format - Document syntax
 * @param source - Label used in error messages (usually the file path)
 * @throws {StructuralError} On syntax errors, schema violations or duplicate ids
 */
export function sequence_parse(text: string, format: SequenceFormat, source: string = '<inline>'): SequenceTable {
    const raw: unknown = document_load(text, format, source);

    const result = SequenceDocumentSchema.safeParse(raw);
    if (!result.success) {
        const issues: string = result.error.issues
            .map((i): string => `[${i.path.join('.')}] ${i.message}`)
            .join('; ');
        throw new StructuralError(`Invalid sequence ${source}: ${issues}`);
    }
    const doc = result.data;

    const nodes: Map<number, DialogueNode> = new Map();
    const order: number[] = [];
    for (const message of doc.messages) {
        if (nodes.has(message.id)) {
            throw new StructuralError(`Invalid sequence ${source}: duplicate message id ${message.id}`);
        }
        nodes.set(message.id, node_build(doc.sequenceId, message));
        order.push(message.id);
    }

    const entryMessageId: number = doc.entryMessageId ?? order[0];
    if (!nodes.has(entryMessageId)) {
        throw new StructuralError(`Invalid sequence ${source}: entry message ${entryMessageId} does not exist`);
    }

    return {
        sequenceId: doc.sequenceId,
        name: doc.name,
        description: doc.description,
        entryMessageId,
        nodes,
        order,
    };
}

/**
 * Derive a node's routing kind from its document type and owner.
 */
export function nodeKind_derive(type: string, ownerSequenceId: string, declaredSequenceId?: string): NodeKind {
    switch (type) {
        case 'choice':     return 'choice';
        case 'autoroute':  return 'conditional-branch';
        case 'dataAction': return 'action';
    }
    if (declaredSequenceId !== undefined && declaredSequenceId !== ownerSequenceId) {
        return 'cross-jump';
    }
    return 'message';
}

// ─── Internals ──────────────────────────────────────────────────

function document_load(text: string, format: SequenceFormat, source: string): unknown {
    try {
        return format === 'json' ? JSON.parse(text) : yaml.load(text);
    } catch (error: unknown) {
        throw new StructuralError(`Invalid sequence ${source}: cannot parse ${format}`, { cause: error });
    }
}

function node_build(sequenceId: string, message: RawMessage): DialogueNode {
    const kind: NodeKind = nodeKind_derive(message.type, sequenceId, message.sequenceId);
    const sender: string = message.sender ?? (message.type === 'user' || message.type === 'choice' ? 'user' : 'bot');

    const node: DialogueNode = {
        sequenceId,
        id: message.id,
        kind,
        type: message.type,
        sender,
        text: message.text,
        choices: message.choices.map((choice): ChoiceOption => ({ ...choice })),
        routes: message.routes.map((route): RouteCondition => ({
            condition: route.condition,
            nextMessageId: route.nextMessageId,
            sequenceId: route.sequenceId,
            isDefault: route.default,
        })),
    };
    if (message.contentKey !== undefined) node.contentKey = message.contentKey;
    if (message.nextMessageId !== undefined) node.nextMessageId = message.nextMessageId;
    if (kind === 'cross-jump') node.targetSequenceId = message.sequenceId;
    return node;
}
