import { describe, expect, it } from 'vitest';
import { defaultConfig } from '../src/config.js';
import { createDefaultDimensionRegistry } from '../src/dimensions.js';
import { InvalidRequestError } from '../src/types.js';
import { normalizeRequest } from '../src/validation.js';
import { REFERENCE } from './helpers.js';

const dimensions = createDefaultDimensionRegistry();
const defaults = defaultConfig();
const now = (): Date => new Date(REFERENCE);

function requestIssues(raw: unknown): readonly string[] {
    try {
        normalizeRequest(raw, dimensions, defaults, now);
    } catch (error) {
        if (error instanceof InvalidRequestError) return error.issues;
        throw error;
    }
    throw new Error('expected an InvalidRequestError');
}

describe('normalizeRequest', () => {
    it('fills in defaults', () => {
        const request = normalizeRequest({ text: 'twenty one' }, dimensions, defaults, now);

        expect(request.text).toBe('twenty one');
        expect(request.context.locale).toEqual({ tag: 'en', lang: 'en' });
        expect(request.context.timezone).toBe('UTC');
        expect(request.context.reference.toISOString()).toBe('2026-10-18T09:00:00.000Z');
        expect(request.context.dimensions).toEqual(dimensions.names());
        expect(request.singleDimension).toBe(false);
        expect(request.withLatent).toBe(true);
        expect(request.maxPasses).toBe(32);
        expect(request.timeoutMs).toBeUndefined();
    });

    it('freezes the resolution context', () => {
        const { context } = normalizeRequest({ text: '' }, dimensions, defaults, now);
        expect(Object.isFrozen(context)).toBe(true);
        expect(Object.isFrozen(context.dimensions)).toBe(true);
    });

    it('takes request values over defaults', () => {
        const request = normalizeRequest(
            {
                text: 'x',
                locale: 'en-gb',
                referenceTime: 0,
                timezone: 'Asia/Tokyo',
                dimensions: ['time', 'time'],
                withLatent: false,
                maxPasses: 4,
                timeoutMs: 50,
            },
            dimensions,
            defaults,
            now
        );

        expect(request.context.locale.tag).toBe('en_GB');
        expect(request.context.reference.getTime()).toBe(0);
        expect(request.context.timezone).toBe('Asia/Tokyo');
        expect(request.context.dimensions).toEqual(['time']);
        expect(request.singleDimension).toBe(true);
        expect(request.withLatent).toBe(false);
        expect(request.maxPasses).toBe(4);
        expect(request.timeoutMs).toBe(50);
    });

    it('rejects text with unpaired surrogates', () => {
        expect(requestIssues({ text: '\uD800abc' })).toEqual(['text: Text contains unpaired surrogate code units']);
    });

    it('accepts paired surrogates', () => {
        expect(normalizeRequest({ text: '😀 5' }, dimensions, defaults, now).text).toBe('😀 5');
    });

    it('rejects non-string text', () => {
        expect(requestIssues({ text: 42 })).toEqual(['text: Expected string, received number']);
    });

    it('rejects unknown time zones and reference times', () => {
        expect(requestIssues({ text: 'x', timezone: 'Nowhere/City', referenceTime: 'not a date' })).toEqual([
            'referenceTime: Invalid reference time',
            'timezone: Unknown time zone',
        ]);
    });

    it('rejects reference times outside years 1-9999', () => {
        expect(requestIssues({ text: 'tomorrow', referenceTime: 8.64e15 })).toEqual([
            'referenceTime: Reference time must fall within years 1-9999',
        ]);
        expect(requestIssues({ text: 'tomorrow', referenceTime: '+010000-01-01T00:00:00Z' })).toEqual([
            'referenceTime: Reference time must fall within years 1-9999',
        ]);
    });

    it('rejects unknown dimensions', () => {
        expect(requestIssues({ text: 'x', dimensions: ['numeral', 'colour'] })).toEqual([
            'dimensions: unknown dimension "colour"',
        ]);
    });

    it('rejects malformed locales', () => {
        expect(requestIssues({ text: 'x', locale: 'english' })).toEqual([
            'locale: expected "xx" or "xx_YY", got "english"',
        ]);
    });
});
