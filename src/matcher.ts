/**
 * Spanwise - Matcher
 *
 * Attempts one compiled rule at one start offset. Items match in order with
 * strict adjacency; a token item may match several pool tokens, so every
 * complete route is explored and offered to the production.
 */

import type { Document } from './document.js';
import type { LiteralMatch, Route, RouteItem, TextMatch } from './pattern.js';
import type { CompiledItem, CompiledRule, CompiledTextItem } from './rule.js';
import type { PoolView } from './stash.js';
import type { Dimension, PayloadOf, Span } from './types.js';
import { isTokenOf, UnhandledVariantError } from './types.js';
import { isPresent } from './utils.js';

// ============================================================================
// Text Match Cache
// ============================================================================

/**
 * Text item outcomes per offset. Text matches do not depend on the pool, so
 * one cache serves every pass of a parse and each (item, offset) pair runs
 * its regex once.
 */
export class TextMatchCache {
    private readonly entries = new Map<CompiledTextItem, Map<number, TextMatch | LiteralMatch | null>>();

    lookup(
        item: CompiledTextItem,
        offset: number,
        compute: () => TextMatch | LiteralMatch | null
    ): TextMatch | LiteralMatch | null {
        let byOffset = this.entries.get(item);
        if (!byOffset) {
            byOffset = new Map();
            this.entries.set(item, byOffset);
        }
        const cached = byOffset.get(offset);
        if (cached !== undefined) {
            return cached;
        }
        const computed = compute();
        byOffset.set(offset, computed);
        return computed;
    }
}

function execText(
    item: CompiledTextItem,
    document: Document,
    offset: number
): TextMatch | LiteralMatch | null {
    item.regex.lastIndex = offset;
    const match = item.regex.exec(document.text);
    if (!match) {
        return null;
    }

    const span: Span = { start: offset, end: offset + match[0].length };
    if (!document.isRangeValid(span.start, span.end)) {
        return null;
    }

    if (item.kind === 'regex') {
        return { kind: 'text', span, text: match[0], groups: match.slice(1) };
    }

    const value = item.values.get(match[0].toLowerCase());
    return value === undefined ? null : { kind: 'literal', span, text: match[0], value };
}

// ============================================================================
// Matching
// ============================================================================

export interface MatchScope {
    readonly document: Document;
    readonly pool: PoolView;
    readonly cache: TextMatchCache;
}

export interface Candidate {
    readonly rule: CompiledRule;
    readonly span: Span;
    readonly payload: PayloadOf<Dimension>;
}

function matchItem(item: CompiledItem, offset: number, scope: MatchScope): RouteItem[] {
    switch (item.kind) {
        case 'regex':
        case 'literals': {
            if (offset > scope.document.length) return [];
            const hit = scope.cache.lookup(item, offset, () => execText(item, scope.document, offset));
            return hit ? [hit] : [];
        }
        case 'predicate':
            return scope.pool
                .startingAt(offset)
                .filter((token) => token.dimension === item.dimension && item.test(token))
                .map((token): RouteItem => ({ kind: 'token', span: token.span, token }));
        case 'range':
            return scope.pool
                .startingAt(offset)
                .filter(
                    (token) =>
                        isTokenOf(token, 'numeral') &&
                        token.payload.value >= item.low &&
                        token.payload.value < item.high
                )
                .map((token): RouteItem => ({ kind: 'token', span: token.span, token }));
        default:
            throw new UnhandledVariantError(item);
    }
}

function collectRoutes(
    items: readonly CompiledItem[],
    index: number,
    offset: number,
    route: RouteItem[],
    scope: MatchScope,
    routes: Route[]
): void {
    if (index === items.length) {
        routes.push([...route]);
        return;
    }
    for (const hit of matchItem(items[index], offset, scope)) {
        route.push(hit);
        collectRoutes(items, index + 1, hit.span.end, route, scope, routes);
        route.pop();
    }
}

/** Every complete route of `rule` starting at `offset`, in discovery order */
export function matchRoutes(rule: CompiledRule, offset: number, scope: MatchScope): Route[] {
    const routes: Route[] = [];
    collectRoutes(rule.items, 0, offset, [], scope, routes);
    return routes;
}

/**
 * Run the rule at `offset` and apply its production to every route. Declined
 * productions and zero-width spans yield nothing; nothing is written anywhere.
 */
export function matchRule(rule: CompiledRule, offset: number, scope: MatchScope): Candidate[] {
    return matchRoutes(rule, offset, scope)
        .map((route): Candidate | null => {
            const last = route[route.length - 1];
            const span: Span = { start: offset, end: last.span.end };
            if (span.end <= span.start) {
                return null;
            }
            const payload = rule.rule.production(route);
            return isPresent(payload) ? { rule, span, payload } : null;
        })
        .filter(isPresent);
}
