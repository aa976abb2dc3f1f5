/**
 * Spanwise - English Numerals and Ordinals
 */

import _ from 'lodash';
import { dimension, groupAt, literals, numericLiteralAt, payloadAt, regex } from '../../pattern.js';
import { type Rule, rule } from '../../rule.js';
import { DOT_DECIMALS, plainNumber, sharedNumeralRules } from '../numeral.js';
import type { EnglishVocabulary } from '../vocabulary.js';

export function englishNumeralRules(vocabulary: EnglishVocabulary): Rule[] {
    const { numerals } = vocabulary;
    const units = _.pickBy(numerals.zeroToNineteen, (value) => value >= 1 && value <= 9);

    return [
        ...sharedNumeralRules(numerals, DOT_DECIMALS),
        rule({
            name: 'integer 21..99',
            dimension: 'numeral',
            pattern: [literals(numerals.tens), regex('[\\s-]+'), literals(units)],
            production: (route) => {
                const tens = numericLiteralAt(route, 0);
                const unit = numericLiteralAt(route, 2);
                return tens === undefined || unit === undefined ? null : plainNumber(tens + unit);
            },
        }),
    ];
}

export function englishOrdinalRules(vocabulary: EnglishVocabulary): Rule[] {
    const firstNine = _.pickBy(vocabulary.ordinals, (value) => value >= 1 && value <= 9);

    return [
        rule({
            name: 'ordinals (first..ninetieth)',
            dimension: 'ordinal',
            pattern: [literals(vocabulary.ordinals)],
            production: (route) => {
                const value = numericLiteralAt(route, 0);
                return value === undefined ? null : { value };
            },
        }),
        rule({
            name: 'ordinal (composite, e.g. twenty-first)',
            dimension: 'ordinal',
            pattern: [literals(vocabulary.numerals.tens), regex('[\\s-]*'), literals(firstNine)],
            production: (route) => {
                const tens = numericLiteralAt(route, 0);
                const unit = numericLiteralAt(route, 2);
                return tens === undefined || unit === undefined ? null : { value: tens + unit };
            },
        }),
        rule({
            name: 'ordinal (digits)',
            dimension: 'ordinal',
            pattern: [regex('(\\d+)\\s?(?:st|nd|rd|th)')],
            production: (route) => {
                const digits = groupAt(route, 0);
                return digits === undefined ? null : { value: Number.parseInt(digits, 10) };
            },
        }),
        rule({
            name: 'the <ordinal>',
            dimension: 'ordinal',
            pattern: [regex('the\\s+'), dimension('ordinal')],
            production: (route) => payloadAt(route, 1, 'ordinal'),
        }),
    ];
}
