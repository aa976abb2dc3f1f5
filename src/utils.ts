/**
 * Spanwise - Utilities
 *
 * Span arithmetic, canonical payload keys and small numeric helpers shared by
 * the engine and the locale tables.
 */

import _ from 'lodash';
import type { Dimension, Span } from './types.js';

// ============================================================================
// Spans
// ============================================================================

export function spanLength(span: Span): number {
    return span.end - span.start;
}

export function overlaps(a: Span, b: Span): boolean {
    return a.start < b.end && b.start < a.end;
}

export function sameSpan(a: Span, b: Span): boolean {
    return a.start === b.start && a.end === b.end;
}

/**
 * True when `outer` covers `inner` and is strictly larger
 *
 * @example
 * strictlyContains({ start: 0, end: 10 }, { start: 0, end: 6 })  // true
 * strictlyContains({ start: 0, end: 6 }, { start: 0, end: 6 })   // false
 */
export function strictlyContains(outer: Span, inner: Span): boolean {
    return (
        outer.start <= inner.start &&
        inner.end <= outer.end &&
        spanLength(outer) > spanLength(inner)
    );
}

// ============================================================================
// Canonical Keys
// ============================================================================

function canonicalize(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(canonicalize);
    }

    if (_.isPlainObject(value) && typeof value === 'object' && value !== null) {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return Object.fromEntries(entries.map(([k, v]) => [k, canonicalize(v)]));
    }

    return value;
}

/**
 * JSON encoding with sorted object keys and `undefined` members dropped, so
 * structurally equal payloads always encode the same way
 *
 * @example
 * stableStringify({ b: 1, a: { d: undefined, c: 2 } })  // '{"a":{"c":2},"b":1}'
 */
export function stableStringify(value: unknown): string {
    return JSON.stringify(canonicalize(value));
}

export function tokenKey(span: Span, dimension: Dimension, payload: unknown): string {
    return `${span.start}:${span.end}:${dimension}:${stableStringify(payload)}`;
}

// ============================================================================
// Numbers
// ============================================================================

/**
 * Turn the digits of an integer into the fractional part
 *
 * @example
 * decimalsToDouble(5)    // 0.5
 * decimalsToDouble(25)   // 0.25
 */
export function decimalsToDouble(value: number): number {
    if (!Number.isInteger(value) || value < 0) {
        return Number.NaN;
    }
    const digits = String(value).length;
    return value / 10 ** digits;
}

/**
 * Parse a decimal number written with the given separators
 *
 * @example
 * parseDecimal('1,000.5', ',', '.')  // 1000.5
 * parseDecimal('1.000,5', '.', ',')  // 1000.5
 */
export function parseDecimal(raw: string, thousands: string, decimal: string): number | null {
    const normalized = raw.split(thousands).join('').split(decimal).join('.');
    if (!/^-?(\d+\.?\d*|\.\d+)$/.test(normalized)) {
        return null;
    }
    const value = Number(normalized);
    return Number.isFinite(value) ? value : null;
}

export function isPresent<T>(value: T | null | undefined): value is T {
    return value !== null && value !== undefined;
}
