import { describe, expect, it } from 'vitest';
import { type SelectionPolicy, selectWinners } from '../src/select.js';
import type { Token } from '../src/types.js';
import { makeToken, numeralToken } from './helpers.js';

const policy: SelectionPolicy = {
    tieBreak: 'rule-order',
    overlap: 'per-dimension',
    singleDimension: false,
    withLatent: true,
};

const tomorrow = (start: number, end: number, latent = false): Token =>
    makeToken('time', start, end, { kind: 'relative', amount: 1, grain: 'day', truncate: true }, { latent });

function spans(tokens: readonly Token[], overrides: Partial<SelectionPolicy> = {}): [string, number, number][] {
    return selectWinners(
        tokens.map((token) => ({ token })),
        { ...policy, ...overrides }
    ).map(({ token }): [string, number, number] => [token.dimension, token.span.start, token.span.end]);
}

describe('selectWinners', () => {
    it('drops spans strictly inside another candidate', () => {
        expect(spans([numeralToken(0, 6, 20), numeralToken(0, 10, 21), numeralToken(7, 10, 1)])).toEqual([
            ['numeral', 0, 10],
        ]);
    });

    it('keeps the longer of two overlapping spans of one dimension', () => {
        expect(spans([numeralToken(0, 5, 1), numeralToken(3, 10, 2)])).toEqual([['numeral', 3, 10]]);
    });

    it('lets different dimensions overlap under the per-dimension policy', () => {
        expect(spans([tomorrow(0, 8), numeralToken(5, 12, 3)])).toEqual([
            ['time', 0, 8],
            ['numeral', 5, 12],
        ]);
    });

    it('resolves cross-dimension overlaps under the strict policy', () => {
        expect(spans([tomorrow(0, 8), numeralToken(5, 12, 3)], { overlap: 'strict' })).toEqual([['time', 0, 8]]);
    });

    it('resolves cross-dimension overlaps when one dimension was requested', () => {
        expect(spans([tomorrow(0, 8), numeralToken(5, 12, 3)], { singleDimension: true })).toEqual([['time', 0, 8]]);
    });

    it('breaks exact ties by rule order', () => {
        const tokens = [
            makeToken('numeral', 0, 2, { value: 12, multipliable: false }, { ruleIndex: 3 }),
            makeToken('numeral', 0, 2, { value: 13, multipliable: false }, { ruleIndex: 1 }),
        ];
        const winners = selectWinners(
            tokens.map((token) => ({ token })),
            policy
        );
        expect(winners.map(({ token }) => token.payload)).toEqual([{ value: 13, multipliable: false }]);
    });

    it('returns every exact tie under keep-all', () => {
        const tokens = [
            makeToken('numeral', 0, 2, { value: 12, multipliable: false }, { ruleIndex: 3 }),
            makeToken('numeral', 0, 2, { value: 13, multipliable: false }, { ruleIndex: 1 }),
        ];
        const winners = selectWinners(
            tokens.map((token) => ({ token })),
            { ...policy, tieBreak: 'keep-all' }
        );
        expect(winners.map(({ token }) => token.ruleIndex)).toEqual([1, 3]);
    });

    it('drops latent readings that overlap a firm one', () => {
        expect(spans([tomorrow(0, 4, true), numeralToken(0, 4, 2026)])).toEqual([['numeral', 0, 4]]);
    });

    it('keeps a lone latent reading unless latent readings are off', () => {
        expect(spans([tomorrow(0, 4, true)])).toEqual([['time', 0, 4]]);
        expect(spans([tomorrow(0, 4, true)], { withLatent: false })).toEqual([]);
    });

    it('orders the output by position', () => {
        expect(spans([numeralToken(10, 12, 7), tomorrow(0, 8), numeralToken(0, 8, 5)])).toEqual([
            ['numeral', 0, 8],
            ['time', 0, 8],
            ['numeral', 10, 12],
        ]);
    });

    it('carries extra fields through', () => {
        const winners = selectWinners([{ token: numeralToken(0, 1, 1), label: 'kept' }], policy);
        expect(winners).toEqual([{ token: numeralToken(0, 1, 1), label: 'kept' }]);
    });
});
