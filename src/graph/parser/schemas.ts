/**
 * @file Sequence Document Schemas
 *
 * Zod runtime schemas for sequence documents (JSON or YAML). Optional
 * fields are permissive; `id` and `messages` are enforced strictly.
 *
 * @module graph/parser/schemas
 */

import { z } from 'zod';

const MessageIdSchema = z.number().int('message ids must be integers');

export const ChoiceSchema = z.object({
    text:          z.string().default(''),
    nextMessageId: MessageIdSchema.optional(),
    sequenceId:    z.string().min(1).optional(),
    contentKey:    z.string().min(1).optional(),
    value:         z.unknown().optional()
});

export const RouteSchema = z.object({
    condition:     z.string().optional(),
    nextMessageId: MessageIdSchema.optional(),
    sequenceId:    z.string().min(1).optional(),
    default:       z.boolean().default(false)
});

export const MessageSchema = z.object({
    id:            MessageIdSchema,
    type:          z.string().default('bot'),
    sender:        z.string().optional(),
    text:          z.string().default(''),
    contentKey:    z.string().min(1).optional(),
    nextMessageId: MessageIdSchema.optional(),
    sequenceId:    z.string().min(1).optional(),
    choices:       z.array(ChoiceSchema).default([]),
    routes:        z.array(RouteSchema).default([])
});

export const SequenceDocumentSchema = z.object({
    sequenceId:     z.string().min(1, 'sequenceId is required'),
    name:           z.string().default(''),
    description:    z.string().default(''),
    entryMessageId: MessageIdSchema.optional(),
    messages:       z.array(MessageSchema).min(1, 'sequence must have at least one message')
});

export type RawSequence = z.infer<typeof SequenceDocumentSchema>;
export type RawMessage  = z.infer<typeof MessageSchema>;
