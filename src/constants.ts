/**
 * Spanwise - Constants
 *
 * Engine limits and request defaults. Everything here can be overridden per
 * extractor (config) or per request.
 */

import type { LogLevel, TimeGrain } from './types.js';

// ============================================================================
// Limits
// ============================================================================

export const LIMITS = {
    /** Hard ceiling on passes, on top of the rule-count bound */
    maxPasses: 32,
    /** Upcoming occurrences reported for a recurring time */
    maxTimeCandidates: 3,
    /** Days scanned forward when looking for a calendar pattern */
    calendarSearchDays: 366 * 8,
} as const;

// ============================================================================
// Selection Policies
// ============================================================================

/**
 * How same-dimension tokens covering exactly the same span are separated.
 * - rule-order: the earliest-declared rule wins, then the payload key
 * - keep-all: all of them are returned
 */
export type TieBreak = 'rule-order' | 'keep-all';

/**
 * Whether tokens of different dimensions may partially overlap in the output.
 * - per-dimension: yes, unless a single dimension was requested
 * - strict: never
 */
export type OverlapPolicy = 'per-dimension' | 'strict';

export const TIE_BREAKS = ['rule-order', 'keep-all'] as const satisfies readonly TieBreak[];

export const OVERLAP_POLICIES = ['per-dimension', 'strict'] as const satisfies readonly OverlapPolicy[];

// ============================================================================
// Defaults
// ============================================================================

export interface Defaults {
    readonly locale: string;
    readonly timezone: string;
    readonly tieBreak: TieBreak;
    readonly overlap: OverlapPolicy;
    readonly withLatent: boolean;
    readonly logLevel: LogLevel;
}

export const DEFAULTS: Defaults = {
    locale: 'en',
    timezone: 'UTC',
    tieBreak: 'rule-order',
    overlap: 'per-dimension',
    withLatent: true,
    logLevel: 'warn',
};

// ============================================================================
// Time
// ============================================================================

export const TIME_GRAINS: readonly TimeGrain[] = [
    'second',
    'minute',
    'hour',
    'day',
    'week',
    'month',
    'quarter',
    'year',
];

/** Month is 30 days and year 365 days when normalizing durations */
export const SECONDS_PER_GRAIN: Readonly<Record<TimeGrain, number>> = {
    second: 1,
    minute: 60,
    hour: 3_600,
    day: 86_400,
    week: 604_800,
    month: 2_592_000,
    quarter: 7_776_000,
    year: 31_536_000,
};
