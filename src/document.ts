/**
 * Spanwise - Document
 *
 * The text under analysis, with the word-boundary check every text match has
 * to pass.
 */

import type { Span } from './types.js';

type CharClass = 'letter' | 'digit' | 'other';

const LETTER = /[\p{L}\p{M}]/u;
const DIGIT = /\p{Nd}/u;

function classify(char: string): CharClass {
    if (LETTER.test(char)) return 'letter';
    if (DIGIT.test(char)) return 'digit';
    return 'other';
}

export class Document {
    private readonly classes: readonly CharClass[];

    constructor(public readonly text: string) {
        this.classes = Array.from({ length: text.length }, (_, i) => classify(text.charAt(i)));
    }

    get length(): number {
        return this.text.length;
    }

    slice(span: Span): string {
        return this.text.slice(span.start, span.end);
    }

    /**
     * A boundary at `offset` is a cut point unless it splits a run of letters
     * or a run of digits
     *
     * @example
     * new Document('someone').isBoundary(4)  // false
     * new Document('100k').isBoundary(3)     // true
     */
    isBoundary(offset: number): boolean {
        if (offset <= 0 || offset >= this.text.length) {
            return true;
        }
        const before = this.classes[offset - 1];
        const after = this.classes[offset];
        return before === 'other' || before !== after;
    }

    /** Both ends of the range fall on cut points */
    isRangeValid(start: number, end: number): boolean {
        return this.isBoundary(start) && this.isBoundary(end);
    }
}
