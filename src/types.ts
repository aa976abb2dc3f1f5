/**
 * Spanwise - Type Definitions
 *
 * Dimensions, payloads, tokens and resolved values shared by the engine,
 * plus the logger and error types surfaced to callers.
 */

// ============================================================================
// Time Payloads
// ============================================================================

export type TimeGrain =
    | 'second'
    | 'minute'
    | 'hour'
    | 'day'
    | 'week'
    | 'month'
    | 'quarter'
    | 'year';

/** A fully specified calendar instant (ISO dates, explicit years) */
export interface InstantTime {
    readonly kind: 'instant';
    readonly year: number;
    readonly month: number;
    readonly day: number;
    readonly hour?: number;
    readonly minute?: number;
    readonly grain: TimeGrain;
}

/** An offset from the reference instant ("tomorrow", "in 3 hours", "last week") */
export interface RelativeTime {
    readonly kind: 'relative';
    readonly amount: number;
    readonly grain: TimeGrain;
    /** Truncate the reference to the grain before shifting */
    readonly truncate: boolean;
}

/** A recurring calendar pattern ("monday", "march 5", "2027") */
export interface CalendarTime {
    readonly kind: 'calendar';
    readonly year?: number;
    readonly month?: number;
    readonly dayOfMonth?: number;
    /** ISO weekday, 1 = Monday ... 7 = Sunday */
    readonly dayOfWeek?: number;
}

/** A time of day, possibly ambiguous between am and pm */
export interface ClockTime {
    readonly kind: 'clock';
    readonly hour: number;
    readonly minute?: number;
    readonly meridiem?: 'am' | 'pm';
}

export type DayTime = InstantTime | RelativeTime | CalendarTime;

export interface IntersectTime {
    readonly kind: 'intersect';
    readonly date: DayTime;
    readonly clock: ClockTime;
}

export interface IntervalTime {
    readonly kind: 'interval';
    readonly from: PointTime;
    readonly to: PointTime;
}

export interface OpenTime {
    readonly kind: 'open';
    readonly direction: 'after' | 'before';
    readonly anchor: PointTime;
}

export type PointTime = DayTime | ClockTime | IntersectTime;

export type TimeData = PointTime | IntervalTime | OpenTime;

// ============================================================================
// Dimension Payloads
// ============================================================================

export interface NumeralData {
    readonly value: number;
    /** Base-10 magnitude of a word like "hundred" (2) or "thousand" (3) */
    readonly grain?: number;
    /** Whether the numeral can multiply a preceding one ("five hundred") */
    readonly multipliable: boolean;
}

export interface OrdinalData {
    readonly value: number;
}

export interface TimeGrainData {
    readonly grain: TimeGrain;
}

export interface DurationData {
    readonly value: number;
    readonly grain: TimeGrain;
}

/** Distance, temperature and volume share a value with an optional unit */
export interface MeasureData {
    readonly value: number;
    readonly unit?: string;
}

export interface QuantityData {
    readonly value: number;
    readonly unit: string;
    readonly product?: string;
}

export interface FinanceData {
    readonly value: number;
    readonly currency?: string;
}

export interface TextData {
    readonly value: string;
}

export interface UrlData {
    readonly value: string;
    readonly domain: string;
}

/**
 * Payload type per dimension. Domain extensions add a dimension by merging
 * into this interface and registering a matching dimension definition.
 */
export interface DimensionPayloads {
    numeral: NumeralData;
    ordinal: OrdinalData;
    time: TimeData;
    timeGrain: TimeGrainData;
    duration: DurationData;
    distance: MeasureData;
    temperature: MeasureData;
    volume: MeasureData;
    quantity: QuantityData;
    finance: FinanceData;
    phoneNumber: TextData;
    email: TextData;
    url: UrlData;
    regexMatch: TextData;
}

export type Dimension = keyof DimensionPayloads;

export type PayloadOf<D extends Dimension> = DimensionPayloads[D];

// ============================================================================
// Tokens
// ============================================================================

/** Half-open `[start, end)` range of UTF-16 offsets */
export interface Span {
    readonly start: number;
    readonly end: number;
}

export interface TokenOf<D extends Dimension> {
    readonly span: Span;
    readonly dimension: D;
    readonly payload: PayloadOf<D>;
    /** Name of the producing rule */
    readonly rule: string;
    /** Declaration index of the producing rule in its registry */
    readonly ruleIndex: number;
    /** Pass (1-based) in which the token first appeared */
    readonly pass: number;
    readonly latent: boolean;
    /** Identity of (span, dimension, payload) */
    readonly key: string;
}

export type Token = TokenOf<Dimension>;

export function isTokenOf<D extends Dimension>(token: Token, dimension: D): token is TokenOf<D> {
    return token.dimension === dimension;
}

// ============================================================================
// Resolved Values
// ============================================================================

export interface NumericValue {
    readonly type: 'value';
    readonly value: number;
    readonly unit?: string;
    readonly product?: string;
}

export interface DurationValue {
    readonly type: 'value';
    readonly value: number;
    readonly unit: TimeGrain;
    readonly normalized: { readonly value: number; readonly unit: 'second' };
}

export interface GrainValue {
    readonly type: 'value';
    readonly value: TimeGrain;
}

export interface TextValue {
    readonly type: 'value';
    readonly value: string;
    readonly domain?: string;
}

export interface TimePoint {
    /** ISO 8601 with the offset of the request timezone */
    readonly value: string;
    readonly grain: TimeGrain;
}

export interface TimeValue {
    readonly type: 'value';
    readonly value: string;
    readonly grain: TimeGrain;
    /** Upcoming candidates, first one equal to `value` */
    readonly values: readonly TimePoint[];
}

export interface TimeIntervalValue {
    readonly type: 'interval';
    readonly from?: TimePoint;
    /** Exclusive end */
    readonly to?: TimePoint;
}

export type ResolvedValue =
    | NumericValue
    | DurationValue
    | GrainValue
    | TextValue
    | TimeValue
    | TimeIntervalValue;

/** Caller-facing result for one surviving span */
export interface Entity {
    readonly dimension: Dimension;
    readonly body: string;
    readonly start: number;
    readonly end: number;
    readonly value: ResolvedValue;
    readonly latent: boolean;
}

// ============================================================================
// Resolution Context
// ============================================================================

export interface Locale {
    /** Normalized tag, e.g. "en_GB" */
    readonly tag: string;
    readonly lang: string;
    readonly region?: string;
}

export interface ResolutionContext {
    readonly locale: Locale;
    readonly reference: Date;
    readonly timezone: string;
    readonly dimensions: readonly Dimension[];
}

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const LOG_LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export function createConsoleLogger(level: LogLevel = 'info'): Logger {
    const threshold = LOG_LEVEL_ORDER[level];
    const enabled = (candidate: LogLevel): boolean => LOG_LEVEL_ORDER[candidate] >= threshold;

    return {
        debug: (message) => {
            if (enabled('debug')) console.debug(`spanwise: ${message}`);
        },
        info: (message) => {
            if (enabled('info')) console.info(`spanwise: ${message}`);
        },
        warn: (message) => {
            if (enabled('warn')) console.warn(`spanwise: ${message}`);
        },
        error: (message) => {
            if (enabled('error')) console.error(`spanwise: ${message}`);
        },
    };
}

export const consoleLogger: Logger = createConsoleLogger('info');

export const silentLogger: Logger = createConsoleLogger('silent');

// ============================================================================
// Errors
// ============================================================================

/** A rule set that cannot be used: raised at registration, never mid-parse */
export class RuleConfigurationError extends Error {
    public readonly name = 'RuleConfigurationError' as const;

    constructor(
        message: string,
        public readonly locale: string,
        public readonly issues: readonly string[]
    ) {
        super(message);
    }
}

export class InvalidRequestError extends Error {
    public readonly name = 'InvalidRequestError' as const;

    constructor(message: string, public readonly issues: readonly string[]) {
        super(message);
    }
}

export class ConfigError extends Error {
    public readonly name = 'ConfigError' as const;

    constructor(message: string, public readonly issues: readonly string[]) {
        super(message);
    }
}

export class UnhandledVariantError extends Error {
    public readonly name = 'UnhandledVariantError' as const;

    constructor(public readonly variant: unknown) {
        super(`Unhandled variant: ${JSON.stringify(variant)}`);
    }
}
