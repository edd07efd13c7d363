/**
 * @file Candidate Validator / Deduplicator
 *
 * Filters generated candidates in order, keeping their relative order:
 *
 * 1. trim, tabs to spaces; empty lines dropped
 * 2. curly braces must balance (a truncated `{placeholder` never passes)
 * 3. bubble count and per-bubble length limits on `|||` segments
 * 4. separator ban when pipes are disallowed
 * 5. case-insensitive blocklist substrings
 * 6. pictographic characters when emojis are forbidden
 * 7. configured PII patterns
 * 8. token-set similarity at or above the threshold against existing
 *    lines, then against lines accepted earlier in the batch
 *
 * @module validation
 */

import type { PipelineConfig } from '../config/schemas.js';
import { BUBBLE_SEPARATOR } from '../generation/prompt.js';
import { jaccard_compute, tokens_extract } from './similarity.js';

export type RejectionReason =
    | 'empty'
    | 'placeholder'
    | 'bubble-count'
    | 'bubble-length'
    | 'pipes'
    | 'blocklist'
    | 'emoji'
    | 'pii'
    | 'duplicate';

export interface ValidationRules {
    maxBubbles: number;
    maxCharsPerBubble: number;
    dedupeThreshold: number;
    blocklist: string[];
    allowPipes: boolean;
    forbidEmojis: boolean;
    piiPatterns: RegExp[];
}

export interface CandidateRejection {
    candidate: string;
    reason: RejectionReason;
}

export interface ValidationReview {
    accepted: string[];
    rejected: CandidateRejection[];
}

const PICTOGRAPHIC: RegExp = /\p{Extended_Pictographic}/u;

/**
 * Validation rules from the `gen`, `style` and `safety` sections.
 */
export function rules_fromConfig(config: PipelineConfig): ValidationRules {
    return {
        maxBubbles: config.gen.max_bubbles_per_line,
        maxCharsPerBubble: config.gen.max_chars_per_bubble,
        dedupeThreshold: config.gen.dedupe_threshold,
        blocklist: config.safety.blocklist,
        allowPipes: config.style.allow_pipes,
        forbidEmojis: config.style.forbid_emojis,
        piiPatterns: config.safety.pii_regexes.map((source: string): RegExp => new RegExp(source)),
    };
}

/**
 * Accepted candidates, normalized, in input order.
 */
export function variants_validate(candidates: string[], existing: string[], rules: ValidationRules): string[] {
    return variants_review(candidates, existing, rules).accepted;
}

/**
 * Accepted candidates plus the reason each rejected one failed.
 */
export function variants_review(candidates: string[], existing: string[], rules: ValidationRules): ValidationReview {
    const existingTokens: Set<string>[] = existing.map(tokens_extract);
    const acceptedTokens: Set<string>[] = [];
    const accepted: string[] = [];
    const rejected: CandidateRejection[] = [];

    for (const candidate of candidates) {
        const line: string = candidate.trim().replace(/\t/g, ' ');
        const reason: RejectionReason | null = rules_check(line, rules);
        if (reason !== null) {
            rejected.push({ candidate, reason });
            continue;
        }

        const tokens: Set<string> = tokens_extract(line);
        const near = (pool: Set<string>): boolean => jaccard_compute(tokens, pool) >= rules.dedupeThreshold;
        if (existingTokens.some(near) || acceptedTokens.some(near)) {
            rejected.push({ candidate, reason: 'duplicate' });
            continue;
        }
        accepted.push(line);
        acceptedTokens.push(tokens);
    }

    return { accepted, rejected };
}

/**
 * First structural or safety rule a normalized line breaks.
 */
function rules_check(line: string, rules: ValidationRules): RejectionReason | null {
    if (line === '') return 'empty';
    if (!braces_balanced(line)) return 'placeholder';

    const bubbles: string[] = line.split(BUBBLE_SEPARATOR);
    if (bubbles.length > rules.maxBubbles) return 'bubble-count';
    if (bubbles.some((bubble: string): boolean => bubble.trim().length > rules.maxCharsPerBubble)) {
        return 'bubble-length';
    }
    if (!rules.allowPipes && bubbles.length > 1) return 'pipes';

    const lowered: string = line.toLowerCase();
    if (rules.blocklist.some((word: string): boolean => lowered.includes(word.toLowerCase()))) {
        return 'blocklist';
    }
    if (rules.forbidEmojis && PICTOGRAPHIC.test(line)) return 'emoji';
    if (rules.piiPatterns.some((pattern: RegExp): boolean => pattern.test(line))) return 'pii';
    return null;
}

/**
 * Running `{`/`}` depth never goes negative and ends at zero.
 */
export function braces_balanced(text: string): boolean {
    let depth: number = 0;
    for (const ch of text) {
        if (ch === '{') depth++;
        else if (ch === '}') depth--;
        if (depth < 0) return false;
    }
    return depth === 0;
}
