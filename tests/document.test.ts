import { describe, expect, it } from 'vitest';
import { Document } from '../src/document.js';

describe('Document.isBoundary', () => {
    it('rejects cuts inside a run of letters or digits', () => {
        expect(new Document('someone').isBoundary(4)).toBe(false);
        expect(new Document('2026').isBoundary(2)).toBe(false);
    });

    it('accepts cuts between different character classes', () => {
        expect(new Document('100k').isBoundary(3)).toBe(true);
        expect(new Document('a b').isBoundary(1)).toBe(true);
        expect(new Document('a-b').isBoundary(2)).toBe(true);
    });

    it('treats both ends of the text as boundaries', () => {
        const document = new Document('abc');
        expect(document.isBoundary(0)).toBe(true);
        expect(document.isBoundary(3)).toBe(true);
    });

    it('counts accented letters as letters', () => {
        expect(new Document('één').isBoundary(1)).toBe(false);
    });
});

describe('Document', () => {
    it('checks both ends of a range', () => {
        const document = new Document('some one');
        expect(document.isRangeValid(5, 8)).toBe(true);
        expect(document.isRangeValid(1, 8)).toBe(false);
    });

    it('slices spans out of the text', () => {
        const document = new Document('twenty one');
        expect(document.slice({ start: 7, end: 10 })).toBe('one');
        expect(document.length).toBe(10);
    });
});
