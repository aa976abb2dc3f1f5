/**
 * Spanwise - Extractor
 *
 * One parse: validate the request, pick the rule set, run passes to a
 * fixpoint, resolve candidate values and select the surviving spans.
 */

import _ from 'lodash';
import { isValidTimeZone } from './calendar.js';
import { defaultConfig, type SpanwiseConfig } from './config.js';
import { Document } from './document.js';
import { type PassStats, runPasses } from './engine.js';
import { createDefaultRuleRegistry } from './locales/index.js';
import { ANY_LOCALE, parseLocale, type RuleRegistry } from './registry.js';
import { selectWinners } from './select.js';
import type { Dimension, Entity, Logger, ResolvedValue, Token } from './types.js';
import { ConfigError, createConsoleLogger, InvalidRequestError } from './types.js';
import { normalizeRequest, type ParseRequest } from './validation.js';

// ============================================================================
// Types
// ============================================================================

export interface ExtractorOptions {
    /** Rule registry to parse with (default: built-in dimensions and locales) */
    rules?: RuleRegistry;
    /** Overrides on top of the defaults, e.g. the result of loadConfig() */
    config?: Partial<SpanwiseConfig>;
    /** Default: console logger at the configured level */
    logger?: Logger;
    /** Clock used when a request carries no reference time */
    now?: () => Date;
}

export interface Analysis {
    readonly entities: Entity[];
    /** Every token in the final pool, in insertion order */
    readonly tokens: readonly Token[];
    readonly stats: PassStats;
}

export interface Extractor {
    parse(request: ParseRequest): Entity[];
    analyze(request: ParseRequest): Analysis;
    /** Locale keys with registered rules, e.g. ["en", "en_GB", "nl"] */
    supportedLocales(): string[];
    supportedDimensions(): Dimension[];
}

interface Resolved {
    readonly token: Token;
    readonly value: ResolvedValue;
}

// ============================================================================
// Helpers
// ============================================================================

function resolveConfig(overrides: Partial<SpanwiseConfig> = {}): SpanwiseConfig {
    const config: SpanwiseConfig = _.defaults({}, overrides, defaultConfig());
    const issues: string[] = [];

    if (!isValidTimeZone(config.timezone)) {
        issues.push(`timezone: unknown time zone "${config.timezone}"`);
    }
    try {
        parseLocale(config.locale);
    } catch (error) {
        if (!(error instanceof InvalidRequestError)) throw error;
        issues.push(...error.issues);
    }
    if (!Number.isInteger(config.maxPasses) || config.maxPasses < 1) {
        issues.push('maxPasses: expected a positive integer');
    }
    if (
        config.maxInvocations !== undefined &&
        (!Number.isInteger(config.maxInvocations) || config.maxInvocations < 1)
    ) {
        issues.push('maxInvocations: expected a positive integer');
    }

    if (issues.length > 0) {
        throw new ConfigError('Invalid Spanwise configuration', issues);
    }
    return config;
}

function toEntity(document: Document, { token, value }: Resolved): Entity {
    return {
        dimension: token.dimension,
        body: document.slice(token.span),
        start: token.span.start,
        end: token.span.end,
        value,
        latent: token.latent,
    };
}

// ============================================================================
// Main Export
// ============================================================================

/**
 * Create an extractor
 *
 * @example
 * const extractor = createExtractor();
 * extractor.parse({ text: 'twenty one', dimensions: ['numeral'] });
 * // [{ dimension: 'numeral', body: 'twenty one', start: 0, end: 10, value: { type: 'value', value: 21 }, latent: false }]
 */
export function createExtractor(options: ExtractorOptions = {}): Extractor {
    const config = resolveConfig(options.config);
    const logger = options.logger ?? createConsoleLogger(config.logLevel);
    const registry = options.rules ?? createDefaultRuleRegistry(logger);
    const { dimensions } = registry;

    const analyze = (request: ParseRequest): Analysis => {
        const normalized = normalizeRequest(request, dimensions, config, options.now);
        const { context } = normalized;

        if (!registry.hasLocale(context.locale)) {
            throw new InvalidRequestError(`Unsupported locale "${context.locale.tag}"`, [
                `locale: no rules registered for "${context.locale.tag}"`,
            ]);
        }

        const document = new Document(normalized.text);
        const rules = registry.rulesFor(context.locale, context.dimensions);
        const { pool, stats } = runPasses(
            document,
            rules,
            {
                maxPasses: normalized.maxPasses,
                ...(normalized.maxInvocations !== undefined && { maxInvocations: normalized.maxInvocations }),
                ...(normalized.timeoutMs !== undefined && { timeoutMs: normalized.timeoutMs }),
            },
            logger
        );

        const requested = new Set<Dimension>(context.dimensions);
        const candidates: Resolved[] = [];
        for (const token of pool.all()) {
            if (!requested.has(token.dimension)) continue;
            const value = dimensions.resolve(token, context);
            if (value !== null) {
                candidates.push({ token, value });
            }
        }

        const winners = selectWinners(candidates, normalized);
        logger.debug(
            `Parsed ${document.length} chars: ${stats.poolSize} tokens, ${winners.length} entities in ${stats.passes} passes`
        );

        return {
            entities: winners.map((winner) => toEntity(document, winner)),
            tokens: pool.all(),
            stats,
        };
    };

    return {
        analyze,
        parse: (request) => analyze(request).entities,
        supportedLocales: () => registry.locales().filter((locale) => locale !== ANY_LOCALE),
        supportedDimensions: () => dimensions.names(),
    };
}
