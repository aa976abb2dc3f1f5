/**
 * Spanwise - English Measures and Money
 *
 * Temperature, distance, volume, quantity and finance: a numeral followed by
 * a unit word, or a currency symbol on either side of one.
 */

import { dimension, groupAt, literals, numeralAt, payloadAt, regex, stringLiteralAt } from '../../pattern.js';
import { type Rule, rule } from '../../rule.js';
import type { MeasureData } from '../../types.js';
import type { EnglishVocabulary } from '../vocabulary.js';

const OPTIONAL_SPACE = regex('\\s*');

function measured(value: number | undefined, unit: string | undefined): MeasureData | null {
    return value === undefined || unit === undefined ? null : { value, unit };
}

export function englishMeasureRules(vocabulary: EnglishVocabulary): Rule[] {
    const { units } = vocabulary;

    return [
        rule({
            name: '<number> <temperature unit>',
            dimension: 'temperature',
            pattern: [dimension('numeral'), OPTIONAL_SPACE, literals(units.temperature)],
            production: (route) => measured(numeralAt(route, 0)?.value, stringLiteralAt(route, 2)),
        }),
        rule({
            name: '<number> <distance unit>',
            dimension: 'distance',
            pattern: [dimension('numeral'), OPTIONAL_SPACE, literals(units.distance)],
            production: (route) => measured(numeralAt(route, 0)?.value, stringLiteralAt(route, 2)),
        }),
        rule({
            name: '<number> <volume unit>',
            dimension: 'volume',
            pattern: [dimension('numeral'), OPTIONAL_SPACE, literals(units.volume)],
            production: (route) => measured(numeralAt(route, 0)?.value, stringLiteralAt(route, 2)),
        }),
        rule({
            name: '<number> <quantity unit>',
            dimension: 'quantity',
            pattern: [dimension('numeral'), OPTIONAL_SPACE, literals(units.quantity)],
            production: (route) => {
                const value = numeralAt(route, 0)?.value;
                const unit = stringLiteralAt(route, 2);
                return value === undefined || unit === undefined ? null : { value, unit };
            },
        }),
        rule({
            name: '<quantity> of <product>',
            dimension: 'quantity',
            pattern: [dimension('quantity', (quantity) => quantity.product === undefined), regex('\\s+of\\s+(\\p{L}+)')],
            production: (route) => {
                const quantity = payloadAt(route, 0, 'quantity');
                const product = groupAt(route, 1)?.toLowerCase();
                return quantity && product ? { ...quantity, product } : null;
            },
        }),
    ];
}

export function englishFinanceRules(vocabulary: EnglishVocabulary): Rule[] {
    const { currencies } = vocabulary;

    return [
        rule({
            name: '<currency symbol> <amount>',
            dimension: 'finance',
            pattern: [literals(currencies.symbols), OPTIONAL_SPACE, dimension('numeral')],
            production: (route) => {
                const currency = stringLiteralAt(route, 0);
                const value = numeralAt(route, 2)?.value;
                return value === undefined || currency === undefined ? null : { value, currency };
            },
        }),
        rule({
            name: '<amount> <currency symbol>',
            dimension: 'finance',
            pattern: [dimension('numeral'), OPTIONAL_SPACE, literals(currencies.symbols)],
            production: (route) => {
                const value = numeralAt(route, 0)?.value;
                const currency = stringLiteralAt(route, 2);
                return value === undefined || currency === undefined ? null : { value, currency };
            },
        }),
        rule({
            name: '<amount> <currency name>',
            dimension: 'finance',
            pattern: [dimension('numeral'), OPTIONAL_SPACE, literals(currencies.names)],
            production: (route) => {
                const value = numeralAt(route, 0)?.value;
                const currency = stringLiteralAt(route, 2);
                return value === undefined || currency === undefined ? null : { value, currency };
            },
        }),
        rule({
            name: '<amount> cents',
            dimension: 'finance',
            pattern: [dimension('numeral'), OPTIONAL_SPACE, literals(currencies.minorUnits)],
            production: (route) => {
                const value = numeralAt(route, 0)?.value;
                const currency = stringLiteralAt(route, 2);
                return value === undefined || currency === undefined ? null : { value: value / 100, currency };
            },
        }),
        rule({
            name: '<amount> and <cents>',
            dimension: 'finance',
            pattern: [
                dimension('finance', (money) => Number.isInteger(money.value)),
                regex('\\s+and\\s+'),
                dimension('finance', (money) => money.value > 0 && money.value < 1),
            ],
            production: (route) => {
                const major = payloadAt(route, 0, 'finance');
                const minor = payloadAt(route, 2, 'finance');
                if (!major || !minor || major.currency !== minor.currency) return null;
                return { value: Math.round((major.value + minor.value) * 100) / 100, currency: major.currency };
            },
        }),
    ];
}
