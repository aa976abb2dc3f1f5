/**
 * Spanwise - Locale Vocabularies
 *
 * Word tables for the built-in locales, read from data/locales/*.json and
 * validated before any rule is built from them.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { RuleConfigurationError } from '../types.js';

const DATA_DIR = new URL('../../data/locales/', import.meta.url);

// ============================================================================
// Schemas
// ============================================================================

const Word = z.string().min(1);

const NumberMap = z.record(Word, z.number());

const StringMap = z.record(Word, Word);

const PowerSchema = z.object({
    value: z.number().positive(),
    grain: z.number().int().positive(),
});

const NumeralVocabularySchema = z.object({
    zeroToNineteen: NumberMap,
    tens: NumberMap,
    powers: z.record(Word, PowerSchema),
    quantifiers: NumberMap,
    dozen: z.array(Word).min(1),
    negative: z.array(Word).min(1),
    intersectWord: Word,
    decimalWord: Word,
});

const TimeGrainSchema = z.enum(['second', 'minute', 'hour', 'day', 'week', 'month', 'quarter', 'year']);

const EnglishVocabularySchema = z.object({
    numerals: NumeralVocabularySchema,
    ordinals: NumberMap,
    timeGrains: z.record(Word, TimeGrainSchema),
    weekdays: z.record(Word, z.number().int().min(1).max(7)),
    months: z.record(Word, z.number().int().min(1).max(12)),
    relativeDays: NumberMap,
    units: z.object({
        temperature: StringMap,
        distance: StringMap,
        volume: StringMap,
        quantity: StringMap,
    }),
    currencies: z.object({
        symbols: StringMap,
        names: StringMap,
        minorUnits: StringMap,
    }),
});

const NumeralOnlyVocabularySchema = z.object({
    numerals: NumeralVocabularySchema,
});

export type NumeralVocabulary = z.infer<typeof NumeralVocabularySchema>;
export type EnglishVocabulary = z.infer<typeof EnglishVocabularySchema>;
export type NumeralOnlyVocabulary = z.infer<typeof NumeralOnlyVocabularySchema>;

// ============================================================================
// Loading
// ============================================================================

function readVocabulary<T>(locale: string, schema: z.ZodType<T>): T {
    const file = new URL(`${locale}.json`, DATA_DIR);
    const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
    const result = schema.safeParse(raw);

    if (!result.success) {
        throw new RuleConfigurationError(
            `Invalid vocabulary for "${locale}"`,
            locale,
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return result.data;
}

export function loadEnglishVocabulary(): EnglishVocabulary {
    return readVocabulary('en', EnglishVocabularySchema);
}

export function loadNumeralVocabulary(locale: 'nl' | 'nb'): NumeralOnlyVocabulary {
    return readVocabulary(locale, NumeralOnlyVocabularySchema);
}
