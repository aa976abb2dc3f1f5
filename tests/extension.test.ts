import { describe, expect, it } from 'vitest';
import { createDefaultDimensionRegistry } from '../src/dimensions.js';
import { createExtractor } from '../src/extractor.js';
import { literals, stringLiteralAt } from '../src/pattern.js';
import { RuleRegistry } from '../src/registry.js';
import { rule } from '../src/rule.js';
import { silentLogger } from '../src/types.js';

declare module '../src/types.js' {
    interface DimensionPayloads {
        colour: { readonly hex: string };
    }
}

describe('custom dimensions', () => {
    const dimensions = createDefaultDimensionRegistry().register({
        name: 'colour',
        resolve: ({ hex }) => ({ type: 'value', value: hex }),
    });
    const rules = new RuleRegistry(dimensions, silentLogger).register('en', [
        rule({
            name: 'colour name',
            dimension: 'colour',
            pattern: [literals({ red: '#ff0000', green: '#00ff00' })],
            production: (route) => {
                const hex = stringLiteralAt(route, 0);
                return hex === undefined ? null : { hex };
            },
        }),
    ]);
    const extractor = createExtractor({ rules, logger: silentLogger });

    it('extracts a dimension registered by the caller', () => {
        expect(extractor.parse({ text: 'a red car', dimensions: ['colour'] })).toEqual([
            {
                dimension: 'colour',
                body: 'red',
                start: 2,
                end: 5,
                value: { type: 'value', value: '#ff0000' },
                latent: false,
            },
        ]);
    });

    it('lists the new dimension', () => {
        expect(extractor.supportedDimensions()).toHaveLength(15);
        expect(extractor.supportedDimensions().at(-1)).toBe('colour');
    });
});
