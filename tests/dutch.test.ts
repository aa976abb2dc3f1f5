import { describe, expect, it } from 'vitest';
import { createExtractor } from '../src/extractor.js';
import { silentLogger } from '../src/types.js';

const extractor = createExtractor({ logger: silentLogger, config: { locale: 'nl' } });

describe('Dutch numerals', () => {
    it.each([
        ['eenentwintig', 21],
        ['drieënveertig', 43],
        ['een en twintig', 21],
        ['drie komma vijf', 3.5],
        ['1.000.000', 1000000],
        ['2,5', 2.5],
        ['twee duizend', 2000],
        ['vijf honderd en twaalf', 512],
        ['min 3', -3],
    ])('reads "%s" as %s', (text, value) => {
        expect(extractor.parse({ text, dimensions: ['numeral'] })).toEqual([
            {
                dimension: 'numeral',
                body: text,
                start: 0,
                end: text.length,
                value: { type: 'value', value },
                latent: false,
            },
        ]);
    });

    it('does not read English words', () => {
        expect(extractor.parse({ text: 'twenty', dimensions: ['numeral'] })).toEqual([]);
    });
});
