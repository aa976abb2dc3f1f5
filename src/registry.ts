/**
 * Spanwise - Rule Registry
 *
 * Rule tables grouped by locale and dimension. A registry is built once at
 * startup and passed to every extractor; rules are compiled and validated
 * when registered, so a broken table fails there and never mid-parse.
 */

import _ from 'lodash';
import type { DimensionRegistry } from './dimensions.js';
import type { CompiledRule, Rule } from './rule.js';
import { compileRule } from './rule.js';
import type { Dimension, Locale, Logger } from './types.js';
import { consoleLogger, InvalidRequestError, RuleConfigurationError } from './types.js';

/** Locale key for rules that apply to every language */
export const ANY_LOCALE = '*';

const LOCALE_PATTERN = /^([a-z]{2,3})(?:[-_]([a-z]{2}))?$/i;

/**
 * Normalize a locale tag
 *
 * @example
 * parseLocale('en-gb')  // { tag: 'en_GB', lang: 'en', region: 'GB' }
 * parseLocale('NL')     // { tag: 'nl', lang: 'nl' }
 */
export function parseLocale(tag: string): Locale {
    const match = LOCALE_PATTERN.exec(tag.trim());
    if (!match) {
        throw new InvalidRequestError(`Invalid locale "${tag}"`, [`locale: expected "xx" or "xx_YY", got "${tag}"`]);
    }
    const lang = match[1].toLowerCase();
    const region = match[2]?.toUpperCase();
    return region === undefined ? { tag: lang, lang } : { tag: `${lang}_${region}`, lang, region };
}

function localeKey(tag: string): string {
    return tag === ANY_LOCALE ? ANY_LOCALE : parseLocale(tag).tag;
}

export class RuleRegistry {
    private readonly groups = new Map<string, Map<Dimension, CompiledRule[]>>();
    private readonly selections = new Map<string, readonly CompiledRule[]>();
    private declared = 0;

    constructor(
        public readonly dimensions: DimensionRegistry,
        private readonly logger: Logger = consoleLogger
    ) {}

    /**
     * Add a rule table for `locale` (a language like "en", a region like
     * "en_GB", or ANY_LOCALE). Either every rule is accepted or none is.
     */
    register(locale: string, rules: readonly Rule[]): this {
        const key = localeKey(locale);
        const isKnownDimension = (name: string): boolean => this.dimensions.has(name);

        const compiled: CompiledRule[] = [];
        const issues: string[] = [];

        rules.forEach((definition, offset) => {
            const result = compileRule(definition, this.declared + offset, isKnownDimension);
            if (result.ok) {
                compiled.push(result.rule);
            } else {
                issues.push(...result.issues.map((issue) => `${definition.name || `#${offset}`}: ${issue}`));
            }
        });

        if (issues.length > 0) {
            throw new RuleConfigurationError(
                `Rule table for "${key}" has ${issues.length} invalid rule definition(s)`,
                key,
                issues
            );
        }

        this.declared += rules.length;
        const group = this.groups.get(key) ?? new Map<Dimension, CompiledRule[]>();
        for (const [dimension, byDimension] of Object.entries(_.groupBy(compiled, (c) => c.rule.dimension))) {
            if (!this.dimensions.has(dimension)) continue;
            group.set(dimension, [...(group.get(dimension) ?? []), ...byDimension]);
        }
        this.groups.set(key, group);
        this.selections.clear();

        this.logger.info(`Registered ${compiled.length} rules for "${key}"`);
        return this;
    }

    /** Locale keys with at least one rule, ANY_LOCALE included */
    locales(): string[] {
        return [...this.groups.keys()].sort();
    }

    hasLocale(locale: Locale): boolean {
        return this.groups.has(locale.lang) || this.groups.has(locale.tag);
    }

    /**
     * Rules for the requested dimensions and their dependencies, drawn from
     * ANY_LOCALE, the language and the region, in declaration order
     */
    rulesFor(locale: Locale, dimensions: readonly Dimension[]): readonly CompiledRule[] {
        const needed = this.dimensions.closure(dimensions);
        const selectionKey = `${locale.tag}|${[...needed].sort().join(',')}`;
        const cached = this.selections.get(selectionKey);
        if (cached) return cached;

        const keys = _.uniq([ANY_LOCALE, locale.lang, locale.tag]);
        const selected = _.sortBy(
            keys.flatMap((key) => {
                const group = this.groups.get(key);
                return group ? needed.flatMap((dimension) => group.get(dimension) ?? []) : [];
            }),
            (rule) => rule.index
        );

        this.selections.set(selectionKey, selected);
        return selected;
    }
}
