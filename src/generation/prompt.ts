/**
 * @file Prompt Builder
 *
 * Assembles the structured generation request for one target: system
 * instructions derived from style rules, the task and its constraints,
 * the context window, and existing phrasings for grounding.
 *
 * @module generation
 */

import type { PipelineConfig } from '../config/schemas.js';
import { address_format, type ContextTurn, type ResolvedPathNode } from '../graph/types.js';

export const BUBBLE_SEPARATOR: string = '|||';

export interface PromptConstraints {
    numVariants: number;
    maxBubblesPerLine: number;
    maxCharsPerBubble: number;
    preservePlaceholders: boolean;
    allowPipes: boolean;
}

export interface PromptTurn {
    sender: string;
    kind: string;
    text: string;
    examples?: string[];
}

export interface GenerationPrompt {
    system: string;
    task: {
        contentKey: string;
        targetPath: string;
        defaultText: string;
        constraints: PromptConstraints;
    };
    context: PromptTurn[];
    exemplars: {
        existingVariants: string[];
        siblingExemplars: string[];
    };
    output_format: {
        type: 'json';
        schema: { variants: ['string'] };
    };
}

export interface PromptInput {
    contentKey: string;
    path: ResolvedPathNode[];
    defaultText: string;
    context: ContextTurn[];
    existingVariants: string[];
    siblingExemplars: string[];
    config: PipelineConfig;
}

/**
 * Build the generation prompt for one target.
 */
export function prompt_build(input: PromptInput): GenerationPrompt {
    const { config } = input;

    return {
        system: systemText_build(config),
        task: {
            contentKey: input.contentKey,
            targetPath: path_describe(input.path),
            defaultText: input.defaultText,
            constraints: {
                numVariants: config.gen.num_variants,
                maxBubblesPerLine: config.gen.max_bubbles_per_line,
                maxCharsPerBubble: config.gen.max_chars_per_bubble,
                preservePlaceholders: config.style.preserve_placeholders,
                allowPipes: config.style.allow_pipes,
            },
        },
        context: input.context.map((turn: ContextTurn): PromptTurn => {
            const out: PromptTurn = { sender: turn.sender, kind: turn.kind, text: turn.reference };
            if (turn.examples && turn.examples.length > 0) out.examples = turn.examples;
            return out;
        }),
        exemplars: {
            existingVariants: input.existingVariants,
            siblingExemplars: config.context.include_sibling_exemplars
                ? input.siblingExemplars.slice(0, config.context.max_exemplars)
                : [],
        },
        output_format: {
            type: 'json',
            schema: { variants: ['string'] },
        },
    };
}

/**
 * Human-readable path: `onboarding:1 > onboarding:2 > checkin:1`.
 */
export function path_describe(path: ResolvedPathNode[]): string {
    return path.map((node: ResolvedPathNode): string => address_format(node)).join(' > ');
}

function systemText_build(config: PipelineConfig): string {
    const sentences: string[] = [
        'You are a UX writer for a friendly accountability chat bot.',
        'Write multiple alternative lines for the specified contentKey.',
    ];
    if (config.style.preserve_placeholders) {
        sentences.push('Keep placeholders like {user.name} exactly unchanged.');
    }
    if (config.style.allow_pipes) {
        sentences.push(
            `Use ${BUBBLE_SEPARATOR} to split long messages into multiple bubbles (max ${config.gen.max_bubbles_per_line}).`,
        );
    } else {
        sentences.push(`Do not use ${BUBBLE_SEPARATOR}; each line is a single bubble.`);
    }
    sentences.push(`Keep each bubble under ${config.gen.max_chars_per_bubble} characters.`);
    if (config.style.forbid_emojis) {
        sentences.push('Do not use emojis.');
    }
    if (config.style.tone.length > 0) {
        sentences.push(`Tone: ${config.style.tone.join(', ')}.`);
    }
    sentences.push('Concise, natural, no marketing fluff.');
    return sentences.join(' ');
}
