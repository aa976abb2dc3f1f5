/**
 * Spanwise - Norwegian Bokmål Numerals
 */

import _ from 'lodash';
import { groupAt, numeralAt, numberBetween, oneOf, regex } from '../pattern.js';
import { type Rule, rule } from '../rule.js';
import { alternation, COMMA_DECIMALS, plainNumber, sharedNumeralRules } from './numeral.js';
import type { NumeralOnlyVocabulary } from './vocabulary.js';

export function norwegianRules({ numerals }: NumeralOnlyVocabulary): Rule[] {
    const units = _.pickBy(numerals.zeroToNineteen, (value) => value >= 1 && value <= 9);

    return [
        ...sharedNumeralRules(numerals, COMMA_DECIMALS),
        rule({
            name: 'integer 21..99 (one word)',
            dimension: 'numeral',
            pattern: [regex(`(${alternation(Object.keys(numerals.tens))})(${alternation(Object.keys(units))})`)],
            production: (route) => {
                const tens = numerals.tens[groupAt(route, 0, 1)?.toLowerCase() ?? ''];
                const unit = units[groupAt(route, 0, 2)?.toLowerCase() ?? ''];
                return unit === undefined || tens === undefined ? null : plainNumber(tens + unit);
            },
        }),
        rule({
            name: 'integer 21..99',
            dimension: 'numeral',
            pattern: [oneOf(Object.values(numerals.tens)), regex('\\s+'), numberBetween(1, 10)],
            production: (route) => {
                const tens = numeralAt(route, 0);
                const unit = numeralAt(route, 2);
                return tens && unit ? plainNumber(tens.value + unit.value) : null;
            },
        }),
    ];
}
