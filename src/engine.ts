/**
 * Spanwise - Pass Driver
 *
 * Runs passes of every rule at every feasible offset until a pass adds no
 * token. Within a pass all attempts read the snapshot taken before it and the
 * new tokens are merged afterwards in canonical order, so the final pool does
 * not depend on the order rules or offsets are tried.
 */

import type { Document } from './document.js';
import { type Candidate, matchRule, type MatchScope, TextMatchCache } from './matcher.js';
import type { CompiledRule } from './rule.js';
import { isCompiledTextItem } from './rule.js';
import { TokenPool } from './stash.js';
import type { Logger, Token } from './types.js';
import { tokenKey } from './utils.js';

// ============================================================================
// Types
// ============================================================================

export interface PassBudget {
    /** Upper bound on passes; the rule count bounds them as well */
    readonly maxPasses: number;
    /** Matcher invocations before the driver gives up; unbounded when unset */
    readonly maxInvocations?: number;
    /** Wall-clock allowance in milliseconds */
    readonly timeoutMs?: number;
}

export type ExhaustionReason = 'invocations' | 'timeout';

export interface PassStats {
    readonly passes: number;
    readonly invocations: number;
    readonly poolSize: number;
    /** Set when a budget cut the parse short */
    readonly exhausted?: ExhaustionReason;
}

export interface PassResult {
    readonly pool: TokenPool;
    readonly stats: PassStats;
}

// ============================================================================
// Helpers
// ============================================================================

function toToken(candidate: Candidate, pass: number): Token {
    const { rule, span, payload } = candidate;
    return {
        span,
        dimension: rule.rule.dimension,
        payload,
        rule: rule.rule.name,
        ruleIndex: rule.index,
        pass,
        latent: rule.rule.latent ?? false,
        key: tokenKey(span, rule.rule.dimension, payload),
    };
}

function compareTokens(a: Token, b: Token): number {
    return (
        a.span.start - b.span.start ||
        a.span.end - b.span.end ||
        (a.key < b.key ? -1 : a.key > b.key ? 1 : 0) ||
        a.ruleIndex - b.ruleIndex
    );
}

/** Offsets where a rule's first item can start */
function feasibleOffsets(rule: CompiledRule, document: Document, starts: readonly number[]): readonly number[] {
    const first = rule.items[0];
    if (isCompiledTextItem(first)) {
        return Array.from({ length: document.length }, (_, offset) => offset);
    }
    return starts;
}

class BudgetExceeded extends Error {
    constructor(public readonly reason: ExhaustionReason) {
        super(`budget exceeded: ${reason}`);
    }
}

// ============================================================================
// Driver
// ============================================================================

export function runPasses(
    document: Document,
    rules: readonly CompiledRule[],
    budget: PassBudget,
    logger: Logger
): PassResult {
    const pool = new TokenPool();
    const cache = new TextMatchCache();
    const passLimit = Math.min(rules.length, budget.maxPasses);
    const deadline = budget.timeoutMs === undefined ? undefined : Date.now() + budget.timeoutMs;
    const invocationLimit = budget.maxInvocations ?? Number.POSITIVE_INFINITY;

    let invocations = 0;
    let passes = 0;
    let exhausted: ExhaustionReason | undefined;

    const charge = (): void => {
        invocations += 1;
        if (invocations > invocationLimit) {
            throw new BudgetExceeded('invocations');
        }
        if (deadline !== undefined && invocations % 256 === 0 && Date.now() > deadline) {
            throw new BudgetExceeded('timeout');
        }
    };

    while (passes < passLimit) {
        const pass = passes + 1;
        const view = pool.snapshot();
        const scope: MatchScope = { document, pool: view, cache };
        const found: Token[] = [];

        try {
            for (const rule of rules) {
                if (rule.textOnly && pass > 1) continue;

                for (const offset of feasibleOffsets(rule, document, view.starts())) {
                    charge();
                    for (const candidate of matchRule(rule, offset, scope)) {
                        found.push(toToken(candidate, pass));
                    }
                }
            }
        } catch (error) {
            if (!(error instanceof BudgetExceeded)) {
                throw error;
            }
            exhausted = error.reason;
            logger.warn(
                `Parse budget exceeded (${error.reason}) during pass ${pass}; ` +
                `keeping ${pool.size} tokens from ${passes} complete passes`
            );
            break;
        }

        passes = pass;
        const added = found.sort(compareTokens).filter((token) => pool.insert(token)).length;
        logger.debug(`Pass ${pass}: ${added} new tokens (${pool.size} total)`);

        if (added === 0) {
            break;
        }
    }

    return {
        pool,
        stats: {
            passes,
            invocations,
            poolSize: pool.size,
            ...(exhausted !== undefined && { exhausted }),
        },
    };
}
