/**
 * Spanwise - English
 */

import type { Rule } from '../../rule.js';
import type { EnglishVocabulary } from '../vocabulary.js';
import { englishFinanceRules, englishMeasureRules } from './measure.js';
import { englishNumeralRules, englishOrdinalRules } from './numeral.js';
import { englishDurationRules, englishTimeRules, slashDateRules } from './time.js';

export function englishRules(vocabulary: EnglishVocabulary): Rule[] {
    return [
        ...englishNumeralRules(vocabulary),
        ...englishOrdinalRules(vocabulary),
        ...englishDurationRules(vocabulary),
        ...englishMeasureRules(vocabulary),
        ...englishFinanceRules(vocabulary),
        ...englishTimeRules(vocabulary),
    ];
}

export function britishEnglishRules(): Rule[] {
    return slashDateRules('day-first');
}

export function americanEnglishRules(): Rule[] {
    return slashDateRules('month-first');
}
