import { describe, expect, it } from 'vitest';
import { parseLocale } from '../src/registry.js';
import { clockHours, resolveTime } from '../src/time.js';
import type { ClockTime, RelativeTime, ResolutionContext } from '../src/types.js';
import { REFERENCE } from './helpers.js';

function contextIn(timezone: string): ResolutionContext {
    return { locale: parseLocale('en'), reference: new Date(REFERENCE), timezone, dimensions: ['time'] };
}

const utc = contextIn('UTC');

const tomorrow: RelativeTime = { kind: 'relative', amount: 1, grain: 'day', truncate: true };

describe('clockHours', () => {
    it('reads a bare hour both ways', () => {
        expect(clockHours({ kind: 'clock', hour: 5 })).toEqual([5, 17]);
        expect(clockHours({ kind: 'clock', hour: 12 })).toEqual([0, 12]);
        expect(clockHours({ kind: 'clock', hour: 18 })).toEqual([18]);
    });

    it('applies am and pm', () => {
        expect(clockHours({ kind: 'clock', hour: 5, meridiem: 'pm' })).toEqual([17]);
        expect(clockHours({ kind: 'clock', hour: 12, meridiem: 'am' })).toEqual([0]);
        expect(clockHours({ kind: 'clock', hour: 12, meridiem: 'pm' })).toEqual([12]);
    });
});

describe('resolveTime', () => {
    it('shifts relative days from the start of today', () => {
        expect(resolveTime(tomorrow, utc)).toEqual({
            type: 'value',
            value: '2026-10-19T00:00:00.000+00:00',
            grain: 'day',
            values: [{ value: '2026-10-19T00:00:00.000+00:00', grain: 'day' }],
        });
    });

    it('shifts untruncated offsets from the reference second', () => {
        expect(resolveTime({ kind: 'relative', amount: 3, grain: 'hour', truncate: false }, utc)).toMatchObject({
            value: '2026-10-18T12:00:00.000+00:00',
            grain: 'second',
        });
    });

    it('lists the next readings of an ambiguous hour', () => {
        const resolved = resolveTime({ kind: 'clock', hour: 5 }, utc);
        expect(resolved?.type === 'value' && resolved.values).toEqual([
            { value: '2026-10-18T17:00:00.000+00:00', grain: 'hour' },
            { value: '2026-10-19T05:00:00.000+00:00', grain: 'hour' },
            { value: '2026-10-19T17:00:00.000+00:00', grain: 'hour' },
        ]);
    });

    it('finds the next weekdays', () => {
        const resolved = resolveTime({ kind: 'calendar', dayOfWeek: 1 }, utc);
        expect(resolved?.type === 'value' && resolved.values.map((point) => point.value)).toEqual([
            '2026-10-19T00:00:00.000+00:00',
            '2026-10-26T00:00:00.000+00:00',
            '2026-11-02T00:00:00.000+00:00',
        ]);
    });

    it('moves a past month to next year', () => {
        const resolved = resolveTime({ kind: 'calendar', month: 3 }, utc);
        expect(resolved?.type === 'value' && resolved.values.map((point) => point.value)).toEqual([
            '2027-03-01T00:00:00.000+00:00',
            '2028-03-01T00:00:00.000+00:00',
            '2029-03-01T00:00:00.000+00:00',
        ]);
    });

    it('resolves a year to its first day', () => {
        expect(resolveTime({ kind: 'calendar', year: 2027 }, utc)).toEqual({
            type: 'value',
            value: '2027-01-01T00:00:00.000+00:00',
            grain: 'year',
            values: [{ value: '2027-01-01T00:00:00.000+00:00', grain: 'year' }],
        });
    });

    it('pins a clock time to a day', () => {
        const resolved = resolveTime(
            { kind: 'intersect', date: tomorrow, clock: { kind: 'clock', hour: 5, meridiem: 'pm' } },
            utc
        );
        expect(resolved).toMatchObject({ type: 'value', value: '2026-10-19T17:00:00.000+00:00', grain: 'hour' });
    });

    it('resolves in the request time zone', () => {
        expect(resolveTime(tomorrow, contextIn('America/New_York'))).toMatchObject({
            value: '2026-10-19T00:00:00.000-04:00',
        });
        expect(
            resolveTime(
                { kind: 'intersect', date: tomorrow, clock: { kind: 'clock', hour: 5, meridiem: 'pm' } },
                contextIn('America/New_York')
            )
        ).toMatchObject({ value: '2026-10-19T17:00:00.000-04:00' });
    });

    it('gives intervals an exclusive end', () => {
        expect(
            resolveTime(
                {
                    kind: 'interval',
                    from: { kind: 'calendar', dayOfWeek: 1 },
                    to: { kind: 'calendar', dayOfWeek: 5 },
                },
                utc
            )
        ).toEqual({
            type: 'interval',
            from: { value: '2026-10-19T00:00:00.000+00:00', grain: 'day' },
            to: { value: '2026-10-24T00:00:00.000+00:00', grain: 'day' },
        });
    });

    it('leaves one side of an open interval empty', () => {
        const anchor: ClockTime = { kind: 'clock', hour: 5, meridiem: 'pm' };
        expect(resolveTime({ kind: 'open', direction: 'after', anchor }, utc)).toEqual({
            type: 'interval',
            from: { value: '2026-10-18T17:00:00.000+00:00', grain: 'hour' },
        });
        expect(resolveTime({ kind: 'open', direction: 'before', anchor }, utc)).toEqual({
            type: 'interval',
            to: { value: '2026-10-18T17:00:00.000+00:00', grain: 'hour' },
        });
    });

    it('drops impossible dates', () => {
        expect(resolveTime({ kind: 'instant', year: 2026, month: 2, day: 30, grain: 'day' }, utc)).toBeNull();
    });

    it('resolves dates in the first century', () => {
        expect(resolveTime({ kind: 'instant', year: 50, month: 3, day: 4, grain: 'day' }, utc)).toMatchObject({
            value: '0050-03-04T00:00:00.000+00:00',
            grain: 'day',
        });
    });

    it('returns null outside years 1-9999', () => {
        expect(resolveTime(tomorrow, { ...utc, reference: new Date(8.64e15) })).toBeNull();
        expect(resolveTime({ kind: 'relative', amount: 300_000, grain: 'year', truncate: true }, utc)).toBeNull();
        expect(resolveTime({ kind: 'relative', amount: 8000, grain: 'year', truncate: true }, utc)).toBeNull();
    });
});
