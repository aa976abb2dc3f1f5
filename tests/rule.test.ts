import { describe, expect, it } from 'vitest';
import { dimension, literals, numberBetween, regex } from '../src/pattern.js';
import { compileRule, rule } from '../src/rule.js';

const onlyNumerals = (name: string): boolean => name === 'numeral';

describe('compileRule', () => {
    it('compiles text-only rules and flags them', () => {
        const result = compileRule(
            rule({
                name: 'digits',
                dimension: 'numeral',
                pattern: [regex('\\d+'), literals({ Dozen: 12 })],
                production: () => null,
            }),
            7,
            onlyNumerals
        );

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.rule.index).toBe(7);
        expect(result.rule.textOnly).toBe(true);

        const second = result.rule.items[1];
        expect(second.kind).toBe('literals');
        if (second.kind !== 'literals') return;
        expect([...second.values.entries()]).toEqual([['dozen', 12]]);
    });

    it('does not flag rules that consume tokens', () => {
        const result = compileRule(
            rule({
                name: 'negated',
                dimension: 'numeral',
                pattern: [regex('-'), dimension('numeral')],
                production: () => null,
            }),
            0,
            onlyNumerals
        );
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.rule.textOnly).toBe(false);
    });

    it('reports every problem of a rule at once', () => {
        const result = compileRule(
            rule({
                name: ' ',
                dimension: 'numeral',
                pattern: [],
                production: () => null,
            }),
            0,
            onlyNumerals
        );
        expect(result).toEqual({ ok: false, issues: ['rule name is empty', 'pattern is empty'] });
    });

    it('rejects dimensions the registry does not know', () => {
        const result = compileRule(
            rule({ name: 'clock', dimension: 'time', pattern: [dimension('time')], production: () => null }),
            0,
            onlyNumerals
        );
        expect(result).toEqual({
            ok: false,
            issues: ['unknown dimension "time"', 'item 0: unknown dimension "time"'],
        });
    });

    it('rejects malformed pattern items', () => {
        const result = compileRule(
            rule({
                name: 'broken',
                dimension: 'numeral',
                pattern: [regex('('), literals({}), numberBetween(5, 5), literals({ '': 1 })],
                production: () => null,
            }),
            0,
            onlyNumerals
        );

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.issues).toHaveLength(4);
        expect(result.issues[0]).toMatch(/^item 0: invalid regex \/\(\/ /);
        expect(result.issues.slice(1)).toEqual([
            'item 1: empty literal set',
            'item 2: empty range [5, 5)',
            'item 3: empty literal form',
        ]);
    });
});
