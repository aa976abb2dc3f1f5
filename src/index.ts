/**
 * Spanwise
 *
 * Extract typed values (numbers, ordinals, durations, measures, money, times,
 * phone numbers, e-mail addresses, URLs) from natural-language text.
 *
 * @example
 * ```typescript
 * import { createExtractor } from 'spanwise';
 *
 * const extractor = createExtractor();
 *
 * extractor.parse({ text: 'twenty one' });
 * // [{ dimension: 'numeral', body: 'twenty one', start: 0, end: 10, value: { type: 'value', value: 21 }, ... }]
 *
 * extractor.parse({
 *     text: 'tomorrow at 5pm',
 *     referenceTime: '2026-10-18T09:00:00Z',
 *     timezone: 'Europe/Amsterdam',
 *     dimensions: ['time'],
 * });
 * ```
 */

export { createExtractor } from './extractor.js';
export type { Analysis, Extractor, ExtractorOptions } from './extractor.js';
export type { ParseRequest } from './validation.js';

export { defaultConfig, loadConfig } from './config.js';
export type { LoadConfigOptions, SpanwiseConfig } from './config.js';
export { DEFAULTS, LIMITS, OVERLAP_POLICIES, TIE_BREAKS } from './constants.js';
export type { OverlapPolicy, TieBreak } from './constants.js';

export { ANY_LOCALE, parseLocale, RuleRegistry } from './registry.js';
export { createDefaultDimensionRegistry, DimensionRegistry, registerBuiltinDimensions } from './dimensions.js';
export type { DimensionDefinition } from './dimensions.js';
export { createDefaultRuleRegistry, registerBuiltinLocales } from './locales/index.js';

export { rule } from './rule.js';
export type { Production, Rule, RuleOf } from './rule.js';
export {
    dimension,
    groupAt,
    literalAt,
    literals,
    numberBetween,
    numberWith,
    numeralAt,
    numericLiteralAt,
    oneOf,
    payloadAt,
    regex,
    stringLiteralAt,
    tokenAt,
} from './pattern.js';
export type { PatternItem, Route, RouteItem } from './pattern.js';
export type { PassStats } from './engine.js';

export {
    ConfigError,
    consoleLogger,
    createConsoleLogger,
    InvalidRequestError,
    isTokenOf,
    RuleConfigurationError,
    silentLogger,
    UnhandledVariantError,
} from './types.js';
export type {
    Dimension,
    DimensionPayloads,
    Entity,
    Locale,
    Logger,
    LogLevel,
    PayloadOf,
    ResolutionContext,
    ResolvedValue,
    TimeData,
    TimeGrain,
    Token,
    TokenOf,
} from './types.js';
