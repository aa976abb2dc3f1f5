/**
 * Spanwise - Dutch Numerals
 */

import _ from 'lodash';
import { groupAt, numeralAt, numberBetween, oneOf, regex } from '../pattern.js';
import { type Rule, rule } from '../rule.js';
import { alternation, COMMA_DECIMALS, plainNumber, sharedNumeralRules } from './numeral.js';
import type { NumeralOnlyVocabulary } from './vocabulary.js';

export function dutchRules({ numerals }: NumeralOnlyVocabulary): Rule[] {
    const units = _.pickBy(numerals.zeroToNineteen, (value) => value >= 1 && value <= 9);

    return [
        ...sharedNumeralRules(numerals, COMMA_DECIMALS),
        rule({
            name: 'integer ([2-9][1-9])',
            dimension: 'numeral',
            pattern: [regex(`(${alternation(Object.keys(units))})(?:e|ë)n(${alternation(Object.keys(numerals.tens))})`)],
            production: (route) => {
                const unit = units[groupAt(route, 0, 1)?.toLowerCase() ?? ''];
                const tens = numerals.tens[groupAt(route, 0, 2)?.toLowerCase() ?? ''];
                return unit === undefined || tens === undefined ? null : plainNumber(unit + tens);
            },
        }),
        rule({
            name: 'numbers en',
            dimension: 'numeral',
            pattern: [numberBetween(1, 10), regex('\\s+en\\s+'), oneOf(Object.values(numerals.tens))],
            production: (route) => {
                const unit = numeralAt(route, 0);
                const tens = numeralAt(route, 2);
                return unit && tens ? plainNumber(unit.value + tens.value) : null;
            },
        }),
    ];
}
