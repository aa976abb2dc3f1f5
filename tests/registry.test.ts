import { describe, expect, it } from 'vitest';
import { createDefaultDimensionRegistry } from '../src/dimensions.js';
import { dimension, numberBetween, regex } from '../src/pattern.js';
import { ANY_LOCALE, parseLocale, RuleRegistry } from '../src/registry.js';
import { type Rule, rule } from '../src/rule.js';
import type { Dimension } from '../src/types.js';
import { InvalidRequestError, RuleConfigurationError, silentLogger } from '../src/types.js';
import { spyLogger } from './helpers.js';

function numeralRule(name: string): Rule {
    return rule({ name, dimension: 'numeral', pattern: [regex(name)], production: () => null });
}

function createRegistry(): RuleRegistry {
    return new RuleRegistry(createDefaultDimensionRegistry(), silentLogger);
}

describe('parseLocale', () => {
    it('normalizes language and region', () => {
        expect(parseLocale('en-gb')).toEqual({ tag: 'en_GB', lang: 'en', region: 'GB' });
        expect(parseLocale('NL')).toEqual({ tag: 'nl', lang: 'nl' });
    });

    it('rejects tags that are not "xx" or "xx_YY"', () => {
        expect(() => parseLocale('english')).toThrow(InvalidRequestError);
        try {
            parseLocale('english');
        } catch (error) {
            expect(error instanceof InvalidRequestError && error.issues).toEqual([
                'locale: expected "xx" or "xx_YY", got "english"',
            ]);
        }
    });
});

describe('RuleRegistry.register', () => {
    it('accepts a whole table and logs it', () => {
        const logger = spyLogger();
        const registry = new RuleRegistry(createDefaultDimensionRegistry(), logger);
        registry.register('en', [numeralRule('one'), numeralRule('two')]);

        expect(registry.locales()).toEqual(['en']);
        expect(logger.info).toHaveBeenCalledWith('Registered 2 rules for "en"');
    });

    it('rejects the whole table when any rule is invalid', () => {
        const registry = createRegistry();
        const broken = rule({
            name: 'bad range',
            dimension: 'numeral',
            pattern: [numberBetween(5, 5)],
            production: () => null,
        });

        let caught: unknown;
        try {
            registry.register('en', [numeralRule('fine'), broken]);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(RuleConfigurationError);
        if (!(caught instanceof RuleConfigurationError)) return;
        expect(caught.locale).toBe('en');
        expect(caught.issues).toEqual(['bad range: item 0: empty range [5, 5)']);
        expect(registry.locales()).toEqual([]);
    });

    it('rejects malformed locale keys', () => {
        expect(() => createRegistry().register('english', [numeralRule('one')])).toThrow(InvalidRequestError);
    });
});

describe('RuleRegistry.rulesFor', () => {
    const registry = createRegistry()
        .register(ANY_LOCALE, [numeralRule('shared')])
        .register('en', [numeralRule('english')])
        .register('en_GB', [numeralRule('british')])
        .register('nl', [numeralRule('dutch')])
        .register('en', [
            rule({
                name: 'span of days',
                dimension: 'duration',
                pattern: [dimension('numeral'), regex('\\s*days')],
                production: () => null,
            }),
            rule({ name: 'noon', dimension: 'time', pattern: [regex('noon')], production: () => null }),
        ]);

    const names = (locale: string, dimensions: readonly Dimension[]): string[] =>
        registry.rulesFor(parseLocale(locale), dimensions).map((compiled) => compiled.rule.name);

    it('merges shared, language and region rules in declaration order', () => {
        expect(names('en_GB', ['numeral'])).toEqual(['shared', 'english', 'british']);
        expect(names('en', ['numeral'])).toEqual(['shared', 'english']);
        expect(names('nl', ['numeral'])).toEqual(['shared', 'dutch']);
    });

    it('includes the rules of dependency dimensions', () => {
        expect(names('en', ['duration'])).toEqual(['shared', 'english', 'span of days']);
        expect(names('en', ['time'])).toEqual(['shared', 'english', 'span of days', 'noon']);
    });

    it('knows which locales it can serve', () => {
        expect(registry.locales()).toEqual(['*', 'en', 'en_GB', 'nl']);
        expect(registry.hasLocale(parseLocale('en_US'))).toBe(true);
        expect(registry.hasLocale(parseLocale('fr'))).toBe(false);
    });

    it('assigns indexes across tables', () => {
        const indexes = registry.rulesFor(parseLocale('en_GB'), ['time']).map((compiled) => compiled.index);
        expect(indexes).toEqual([0, 1, 2, 4, 5]);
    });
});
