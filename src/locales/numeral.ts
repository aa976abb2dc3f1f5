/**
 * Spanwise - Shared Numeral Rules
 *
 * Numeral composition every built-in language shares: digits, separators,
 * number words from the vocabulary, multiplication, intersection, suffixes
 * and negation. Language files add their own compounds on top.
 */

import _ from 'lodash';
import { dimension, groupAt, literals, numberWith, numeralAt, numericLiteralAt, regex, stringLiteralAt } from '../pattern.js';
import { type Rule, rule } from '../rule.js';
import type { NumeralData } from '../types.js';
import { decimalsToDouble, parseDecimal } from '../utils.js';
import type { NumeralVocabulary } from './vocabulary.js';

export interface NumberFormat {
    readonly thousands: string;
    readonly decimal: string;
}

export const COMMA_DECIMALS: NumberFormat = { thousands: '.', decimal: ',' };

export const DOT_DECIMALS: NumberFormat = { thousands: ',', decimal: '.' };

const SUFFIX_MULTIPLIERS: Readonly<Record<string, number>> = { k: 1e3, m: 1e6, g: 1e9 };

// ============================================================================
// Helpers
// ============================================================================

export function plainNumber(value: number): NumeralData {
    return { value, multipliable: false };
}

/**
 * Product of two numerals; a multiplier with a grain must be larger than the
 * multiplicand and passes its grain on
 *
 * @example
 * multiply(plainNumber(5), { value: 100, grain: 2, multipliable: true })  // { value: 500, grain: 2, ... }
 */
export function multiply(left: NumeralData, right: NumeralData): NumeralData | null {
    if (right.grain === undefined) {
        return plainNumber(left.value * right.value);
    }
    if (right.value <= left.value) {
        return null;
    }
    return { value: left.value * right.value, grain: right.grain, multipliable: false };
}

/** `left + right` when right fits below left's grain ("hundred" + "five") */
export function intersect(left: NumeralData, right: NumeralData): NumeralData | null {
    if (left.grain === undefined || 10 ** left.grain <= right.value) {
        return null;
    }
    return plainNumber(left.value + right.value);
}

/** Regex alternation of `words`, longest first */
export function alternation(words: readonly string[]): string {
    return _.sortBy(words, (word) => -word.length)
        .map(_.escapeRegExp)
        .join('|');
}

const hasGrainAbove = (grain: number) => (numeral: NumeralData) => (numeral.grain ?? 0) > grain;

// ============================================================================
// Rules
// ============================================================================

export function sharedNumeralRules(vocabulary: NumeralVocabulary, format: NumberFormat): Rule[] {
    const thousands = _.escapeRegExp(format.thousands);
    const decimal = _.escapeRegExp(format.decimal);
    const parse = (raw: string | undefined): number | null =>
        raw === undefined ? null : parseDecimal(raw, format.thousands, format.decimal);

    return [
        rule({
            name: 'integer (numeric)',
            dimension: 'numeral',
            pattern: [regex('(\\d{1,18})')],
            production: (route) => {
                const value = parse(groupAt(route, 0));
                return value === null ? null : plainNumber(value);
            },
        }),
        rule({
            name: 'integer with thousands separator',
            dimension: 'numeral',
            pattern: [regex(`(\\d{1,3}(?:${thousands}\\d{3}){1,5})`)],
            production: (route) => {
                const value = parse(groupAt(route, 0));
                return value === null ? null : plainNumber(value);
            },
        }),
        rule({
            name: 'decimal number',
            dimension: 'numeral',
            pattern: [regex(`(\\d*${decimal}\\d+)`)],
            production: (route) => {
                const value = parse(groupAt(route, 0));
                return value === null ? null : plainNumber(value);
            },
        }),
        rule({
            name: 'decimal with thousands separator',
            dimension: 'numeral',
            pattern: [regex(`(\\d{1,3}(?:${thousands}\\d{3})+${decimal}\\d+)`)],
            production: (route) => {
                const value = parse(groupAt(route, 0));
                return value === null ? null : plainNumber(value);
            },
        }),
        rule({
            name: 'integer (0..19)',
            dimension: 'numeral',
            pattern: [literals(vocabulary.zeroToNineteen)],
            production: (route) => {
                const value = numericLiteralAt(route, 0);
                return value === undefined ? null : plainNumber(value);
            },
        }),
        rule({
            name: 'integer (tens)',
            dimension: 'numeral',
            pattern: [literals(vocabulary.tens)],
            production: (route) => {
                const value = numericLiteralAt(route, 0);
                return value === undefined ? null : plainNumber(value);
            },
        }),
        rule({
            name: 'powers of ten',
            dimension: 'numeral',
            pattern: [literals(_.mapValues(vocabulary.powers, (_power, form) => form))],
            production: (route) => {
                const form = stringLiteralAt(route, 0);
                const power = form === undefined ? undefined : vocabulary.powers[form];
                return power && { value: power.value, grain: power.grain, multipliable: true };
            },
        }),
        rule({
            name: 'quantifier',
            dimension: 'numeral',
            pattern: [literals(vocabulary.quantifiers)],
            production: (route) => {
                const value = numericLiteralAt(route, 0);
                return value === undefined ? null : plainNumber(value);
            },
        }),
        rule({
            name: 'dozen',
            dimension: 'numeral',
            pattern: [regex(`(?:${alternation(vocabulary.dozen)})`)],
            production: () => ({ value: 12, grain: 1, multipliable: true }),
        }),
        rule({
            name: 'compose by multiplication',
            dimension: 'numeral',
            pattern: [dimension('numeral'), regex('\\s*'), numberWith((numeral) => numeral.multipliable)],
            production: (route) => {
                const left = numeralAt(route, 0);
                const right = numeralAt(route, 2);
                return left && right ? multiply(left, right) : null;
            },
        }),
        rule({
            name: 'intersect',
            dimension: 'numeral',
            pattern: [
                numberWith(hasGrainAbove(1)),
                regex('\\s*'),
                numberWith((numeral) => !numeral.multipliable),
            ],
            production: (route) => {
                const left = numeralAt(route, 0);
                const right = numeralAt(route, 2);
                return left && right ? intersect(left, right) : null;
            },
        }),
        rule({
            name: `intersect (with ${vocabulary.intersectWord})`,
            dimension: 'numeral',
            pattern: [
                numberWith(hasGrainAbove(1)),
                regex(`\\s+${_.escapeRegExp(vocabulary.intersectWord)}\\s+`),
                numberWith((numeral) => !numeral.multipliable),
            ],
            production: (route) => {
                const left = numeralAt(route, 0);
                const right = numeralAt(route, 2);
                return left && right ? intersect(left, right) : null;
            },
        }),
        rule({
            name: `number ${vocabulary.decimalWord} number`,
            dimension: 'numeral',
            pattern: [
                dimension('numeral'),
                regex(`\\s+${_.escapeRegExp(vocabulary.decimalWord)}\\s+`),
                numberWith((numeral) => numeral.grain === undefined),
            ],
            production: (route) => {
                const whole = numeralAt(route, 0);
                const fraction = numeralAt(route, 2);
                if (!whole || !fraction) return null;
                const value = whole.value + decimalsToDouble(fraction.value);
                return Number.isNaN(value) ? null : plainNumber(value);
            },
        }),
        rule({
            name: 'numbers suffixes (K, M, G)',
            dimension: 'numeral',
            pattern: [dimension('numeral'), regex('([kmg])')],
            production: (route) => {
                const numeral = numeralAt(route, 0);
                const suffix = groupAt(route, 1)?.toLowerCase();
                const multiplier = suffix === undefined ? undefined : SUFFIX_MULTIPLIERS[suffix];
                return numeral && multiplier !== undefined ? plainNumber(numeral.value * multiplier) : null;
            },
        }),
        rule({
            name: 'numbers prefix with -, negative or minus',
            dimension: 'numeral',
            pattern: [regex(`(?:-|${alternation(vocabulary.negative)})\\s*`), dimension('numeral')],
            production: (route) => {
                const numeral = numeralAt(route, 1);
                return numeral && numeral.value > 0 ? plainNumber(-numeral.value) : null;
            },
        }),
    ];
}
