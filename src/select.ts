/**
 * Spanwise - Selection
 *
 * Picks the surviving spans among resolved candidates: latent readings give
 * way to firm ones, contained spans give way to their containers, and a
 * greedy longest-first pass removes the remaining conflicts.
 */

import type { OverlapPolicy, TieBreak } from './constants.js';
import type { Token } from './types.js';
import { overlaps, sameSpan, spanLength, strictlyContains } from './utils.js';

export interface SelectionPolicy {
    readonly tieBreak: TieBreak;
    readonly overlap: OverlapPolicy;
    /** Exactly one dimension was requested */
    readonly singleDimension: boolean;
    readonly withLatent: boolean;
}

export interface Selectable {
    readonly token: Token;
}

const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

function greedyOrder(a: Token, b: Token): number {
    return (
        spanLength(b.span) - spanLength(a.span) ||
        a.span.start - b.span.start ||
        a.ruleIndex - b.ruleIndex ||
        compareStrings(a.dimension, b.dimension) ||
        compareStrings(a.key, b.key)
    );
}

function outputOrder(a: Token, b: Token): number {
    return (
        a.span.start - b.span.start ||
        a.span.end - b.span.end ||
        compareStrings(a.dimension, b.dimension) ||
        a.ruleIndex - b.ruleIndex ||
        compareStrings(a.key, b.key)
    );
}

function conflicts(candidate: Token, accepted: Token, policy: SelectionPolicy): boolean {
    if (!overlaps(candidate.span, accepted.span)) return false;

    const sameDimension = candidate.dimension === accepted.dimension;
    if (policy.tieBreak === 'keep-all' && sameDimension && sameSpan(candidate.span, accepted.span)) {
        return false;
    }
    return sameDimension || policy.singleDimension || policy.overlap === 'strict';
}

/**
 * Select the output set from resolved candidates. Candidates must already be
 * limited to the requested dimensions.
 */
export function selectWinners<T extends Selectable>(candidates: readonly T[], policy: SelectionPolicy): T[] {
    const firm = candidates.filter(({ token }) => !token.latent);
    const plausible = candidates.filter(
        ({ token }) =>
            !token.latent ||
            (policy.withLatent && !firm.some((other) => overlaps(other.token.span, token.span)))
    );

    const outermost = plausible.filter(
        ({ token }) => !plausible.some((other) => strictlyContains(other.token.span, token.span))
    );

    const accepted: T[] = [];
    for (const candidate of [...outermost].sort((a, b) => greedyOrder(a.token, b.token))) {
        if (!accepted.some((winner) => conflicts(candidate.token, winner.token, policy))) {
            accepted.push(candidate);
        }
    }

    return accepted.sort((a, b) => outputOrder(a.token, b.token));
}
