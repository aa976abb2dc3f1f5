/**
 * Spanwise - Pattern Items
 *
 * The four primitive matchers a rule is built from, and the route items a
 * successful match hands to the rule's production.
 *
 * Text items (regex, literals) consume raw characters; token items
 * (predicate, range) consume one token already in the pool.
 */

import type { Dimension, NumeralData, PayloadOf, Span, Token, TokenOf } from './types.js';
import { isTokenOf } from './types.js';

// ============================================================================
// Pattern Items
// ============================================================================

export interface RegexItem {
    readonly kind: 'regex';
    /** ECMAScript source, compiled case-insensitive and sticky at load time */
    readonly source: string;
}

export type LiteralValue = string | number;

export interface LiteralsItem {
    readonly kind: 'literals';
    /** Accepted forms (matched case-insensitively) and the value each maps to */
    readonly entries: Readonly<Record<string, LiteralValue>>;
}

export interface PredicateItem {
    readonly kind: 'predicate';
    readonly dimension: Dimension;
    readonly test: (token: Token) => boolean;
}

/** A numeral whose value lies in `[low, high)` */
export interface RangeItem {
    readonly kind: 'range';
    readonly low: number;
    readonly high: number;
}

export type PatternItem = RegexItem | LiteralsItem | PredicateItem | RangeItem;

export type TextItem = RegexItem | LiteralsItem;

export function isTextItem(item: PatternItem): item is TextItem {
    return item.kind === 'regex' || item.kind === 'literals';
}

// ============================================================================
// Constructors
// ============================================================================

export function regex(source: string): RegexItem {
    return { kind: 'regex', source };
}

export function literals(entries: Readonly<Record<string, LiteralValue>>): LiteralsItem {
    return { kind: 'literals', entries };
}

/**
 * Any token of `dim`, optionally narrowed by a test over its payload
 *
 * @example
 * dimension('numeral')
 * dimension('time', (time) => time.kind === 'clock')
 */
export function dimension<D extends Dimension>(
    dim: D,
    test?: (payload: PayloadOf<D>) => boolean
): PredicateItem {
    return {
        kind: 'predicate',
        dimension: dim,
        test: (token) => isTokenOf(token, dim) && (test === undefined || test(token.payload)),
    };
}

export function numberWith(test: (numeral: NumeralData) => boolean): PredicateItem {
    return dimension('numeral', test);
}

export function numberBetween(low: number, high: number): RangeItem {
    return { kind: 'range', low, high };
}

export function oneOf(values: readonly number[]): PredicateItem {
    return numberWith((numeral) => values.includes(numeral.value));
}

// ============================================================================
// Route Items
// ============================================================================

export interface TextMatch {
    readonly kind: 'text';
    readonly span: Span;
    readonly text: string;
    /** Capture groups 1..n (empty when the regex has none) */
    readonly groups: readonly (string | undefined)[];
}

export interface LiteralMatch {
    readonly kind: 'literal';
    readonly span: Span;
    readonly text: string;
    readonly value: LiteralValue;
}

export interface TokenMatch {
    readonly kind: 'token';
    readonly span: Span;
    readonly token: Token;
}

export type RouteItem = TextMatch | LiteralMatch | TokenMatch;

export type Route = readonly RouteItem[];

// ============================================================================
// Route Accessors
// ============================================================================

export function tokenAt<D extends Dimension>(
    route: Route,
    index: number,
    dim: D
): TokenOf<D> | undefined {
    const item = route[index];
    if (item?.kind !== 'token') return undefined;
    return isTokenOf(item.token, dim) ? item.token : undefined;
}

export function payloadAt<D extends Dimension>(
    route: Route,
    index: number,
    dim: D
): PayloadOf<D> | undefined {
    return tokenAt(route, index, dim)?.payload;
}

export function numeralAt(route: Route, index: number): NumeralData | undefined {
    return payloadAt(route, index, 'numeral');
}

/** Capture group `group` (1-based) of a regex item, or the whole match for 0 */
export function groupAt(route: Route, index: number, group = 1): string | undefined {
    const item = route[index];
    if (item?.kind !== 'text') return undefined;
    return group === 0 ? item.text : item.groups[group - 1];
}

export function literalAt(route: Route, index: number): LiteralValue | undefined {
    const item = route[index];
    return item?.kind === 'literal' ? item.value : undefined;
}

export function numericLiteralAt(route: Route, index: number): number | undefined {
    const value = literalAt(route, index);
    return typeof value === 'number' ? value : undefined;
}

export function stringLiteralAt(route: Route, index: number): string | undefined {
    const value = literalAt(route, index);
    return typeof value === 'string' ? value : undefined;
}
