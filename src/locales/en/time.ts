/**
 * Spanwise - English Time
 *
 * Time grains, durations and times. Time rules build structured payloads
 * (relative offsets, calendar patterns, clock readings and their
 * combinations); anchoring them to the reference instant is left to the
 * time dimension's resolver.
 */

import { isValidDate } from '../../calendar.js';
import { SECONDS_PER_GRAIN, TIME_GRAINS } from '../../constants.js';
import {
    dimension,
    groupAt,
    literals,
    numberWith,
    numericLiteralAt,
    payloadAt,
    regex,
    type Route,
    stringLiteralAt,
} from '../../pattern.js';
import { type Rule, rule } from '../../rule.js';
import type {
    CalendarTime,
    ClockTime,
    DayTime,
    DurationData,
    InstantTime,
    NumeralData,
    PointTime,
    RelativeTime,
    TimeData,
    TimeGrain,
} from '../../types.js';
import type { EnglishVocabulary } from '../vocabulary.js';

// ============================================================================
// Helpers
// ============================================================================

const DAY_GRAINS: readonly TimeGrain[] = ['day', 'week', 'month', 'quarter', 'year'];

const NOW: RelativeTime = { kind: 'relative', amount: 0, grain: 'second', truncate: false };

function isPoint(time: TimeData): time is PointTime {
    return time.kind !== 'interval' && time.kind !== 'open';
}

function isClock(time: TimeData): time is ClockTime {
    return time.kind === 'clock';
}

/** A whole day or longer, something a clock time can be pinned to */
function isDay(time: TimeData): time is DayTime {
    switch (time.kind) {
        case 'instant':
            return time.hour === undefined;
        case 'calendar':
            return time.dayOfMonth !== undefined || time.dayOfWeek !== undefined;
        case 'relative':
            return time.truncate && DAY_GRAINS.includes(time.grain);
        default:
            return false;
    }
}

const wholeNumber = (low: number, high: number) =>
    numberWith((numeral: NumeralData) => Number.isInteger(numeral.value) && numeral.value >= low && numeral.value <= high);

function meridiemOf(letter: string | undefined): ClockTime['meridiem'] {
    if (letter === undefined) return undefined;
    return letter.toLowerCase() === 'a' ? 'am' : 'pm';
}

function instant(year: number, month: number, day: number): InstantTime | null {
    return isValidDate(year, month, day) ? { kind: 'instant', year, month, day, grain: 'day' } : null;
}

function dayOfMonthAt(route: Route, index: number): number | undefined {
    const value = payloadAt(route, index, 'numeral')?.value ?? payloadAt(route, index, 'ordinal')?.value;
    return value !== undefined && Number.isInteger(value) && value >= 1 && value <= 31 ? value : undefined;
}

const dayOfMonthItem = (dim: 'numeral' | 'ordinal') =>
    dim === 'numeral'
        ? wholeNumber(1, 31)
        : dimension('ordinal', (ordinal) => Number.isInteger(ordinal.value) && ordinal.value >= 1 && ordinal.value <= 31);

/** Express `first` in the smaller grain of `second` and add them */
function combineDurations(first: DurationData, second: DurationData): DurationData | null {
    const ratio = SECONDS_PER_GRAIN[first.grain] / SECONDS_PER_GRAIN[second.grain];
    if (ratio <= 1) return null;
    return { value: first.value * ratio + second.value, grain: second.grain };
}

// ============================================================================
// Time Grains & Durations
// ============================================================================

export function englishDurationRules(vocabulary: EnglishVocabulary): Rule[] {
    return [
        rule({
            name: 'time grain',
            dimension: 'timeGrain',
            pattern: [literals(vocabulary.timeGrains)],
            production: (route) => {
                const word = stringLiteralAt(route, 0);
                const grain = TIME_GRAINS.find((candidate) => candidate === word);
                return grain === undefined ? null : { grain };
            },
        }),
        rule({
            name: '<integer> <unit-of-duration>',
            dimension: 'duration',
            pattern: [numberWith((numeral) => numeral.value > 0), regex('\\s*'), dimension('timeGrain')],
            production: (route) => {
                const value = payloadAt(route, 0, 'numeral')?.value;
                const grain = payloadAt(route, 2, 'timeGrain')?.grain;
                return value === undefined || grain === undefined ? null : { value, grain };
            },
        }),
        rule({
            name: 'a <unit-of-duration>',
            dimension: 'duration',
            pattern: [regex('an?\\s+'), dimension('timeGrain')],
            production: (route) => {
                const grain = payloadAt(route, 1, 'timeGrain')?.grain;
                return grain === undefined ? null : { value: 1, grain };
            },
        }),
        rule({
            name: 'half a <unit-of-duration>',
            dimension: 'duration',
            pattern: [regex('half\\s+an?\\s+'), dimension('timeGrain')],
            production: (route) => {
                const grain = payloadAt(route, 1, 'timeGrain')?.grain;
                return grain === undefined ? null : { value: 0.5, grain };
            },
        }),
        rule({
            name: '<duration> and a half',
            dimension: 'duration',
            pattern: [dimension('duration', (duration) => Number.isInteger(duration.value)), regex('\\s+and\\s+a\\s+half')],
            production: (route) => {
                const duration = payloadAt(route, 0, 'duration');
                return duration && { value: duration.value + 0.5, grain: duration.grain };
            },
        }),
        rule({
            name: 'composite <duration>',
            dimension: 'duration',
            pattern: [dimension('duration'), regex(',?\\s*(?:and\\s+)?'), dimension('duration')],
            production: (route) => {
                const first = payloadAt(route, 0, 'duration');
                const second = payloadAt(route, 2, 'duration');
                return first && second ? combineDurations(first, second) : null;
            },
        }),
    ];
}

// ============================================================================
// Time
// ============================================================================

export function englishTimeRules(vocabulary: EnglishVocabulary): Rule[] {
    return [
        // Anchors
        rule({
            name: 'now',
            dimension: 'time',
            pattern: [regex('(?:right\\s+)?now')],
            production: () => NOW,
        }),
        rule({
            name: 'today, tomorrow, yesterday',
            dimension: 'time',
            pattern: [literals(vocabulary.relativeDays)],
            production: (route) => {
                const amount = numericLiteralAt(route, 0);
                return amount === undefined ? null : { kind: 'relative', amount, grain: 'day', truncate: true };
            },
        }),
        rule({
            name: 'day of week',
            dimension: 'time',
            pattern: [literals(vocabulary.weekdays)],
            production: (route) => {
                const dayOfWeek = numericLiteralAt(route, 0);
                return dayOfWeek === undefined ? null : { kind: 'calendar', dayOfWeek };
            },
        }),
        rule({
            name: 'month',
            dimension: 'time',
            pattern: [literals(vocabulary.months)],
            latent: true,
            production: (route) => {
                const month = numericLiteralAt(route, 0);
                return month === undefined ? null : { kind: 'calendar', month };
            },
        }),
        rule({
            name: 'year (latent)',
            dimension: 'time',
            pattern: [wholeNumber(1900, 2100)],
            latent: true,
            production: (route) => {
                const year = payloadAt(route, 0, 'numeral')?.value;
                return year === undefined ? null : { kind: 'calendar', year };
            },
        }),
        rule({
            name: 'in <year>',
            dimension: 'time',
            pattern: [regex('in\\s+'), wholeNumber(1000, 2100)],
            production: (route) => {
                const year = payloadAt(route, 1, 'numeral')?.value;
                return year === undefined ? null : { kind: 'calendar', year };
            },
        }),
        rule({
            name: 'on|this <day>',
            dimension: 'time',
            pattern: [regex('(?:on|this)\\s+'), dimension('time', isDay)],
            production: (route) => payloadAt(route, 1, 'time'),
        }),

        // Dates
        rule({
            name: '<month> <day-of-month> (numeral)',
            dimension: 'time',
            pattern: [literals(vocabulary.months), regex('\\s+'), dayOfMonthItem('numeral')],
            production: (route) => monthDay(numericLiteralAt(route, 0), dayOfMonthAt(route, 2)),
        }),
        rule({
            name: '<month> <day-of-month> (ordinal)',
            dimension: 'time',
            pattern: [literals(vocabulary.months), regex('\\s+(?:the\\s+)?'), dayOfMonthItem('ordinal')],
            production: (route) => monthDay(numericLiteralAt(route, 0), dayOfMonthAt(route, 2)),
        }),
        rule({
            name: '<day-of-month> (numeral) <month>',
            dimension: 'time',
            pattern: [dayOfMonthItem('numeral'), regex('\\s+'), literals(vocabulary.months)],
            production: (route) => monthDay(numericLiteralAt(route, 2), dayOfMonthAt(route, 0)),
        }),
        rule({
            name: '<day-of-month> (ordinal) of <month>',
            dimension: 'time',
            pattern: [dayOfMonthItem('ordinal'), regex('\\s+(?:of\\s+)?'), literals(vocabulary.months)],
            production: (route) => monthDay(numericLiteralAt(route, 2), dayOfMonthAt(route, 0)),
        }),
        rule({
            name: '<month day> <year>',
            dimension: 'time',
            pattern: [
                dimension(
                    'time',
                    (time) =>
                        time.kind === 'calendar' &&
                        time.year === undefined &&
                        time.dayOfWeek === undefined &&
                        time.month !== undefined &&
                        time.dayOfMonth !== undefined
                ),
                regex(',?\\s+'),
                wholeNumber(1000, 2100),
            ],
            production: (route) => {
                const date = payloadAt(route, 0, 'time');
                const year = payloadAt(route, 2, 'numeral')?.value;
                if (date?.kind !== 'calendar' || year === undefined) return null;
                const { month, dayOfMonth } = date;
                return month === undefined || dayOfMonth === undefined ? null : instant(year, month, dayOfMonth);
            },
        }),
        rule({
            name: '<month> <year>',
            dimension: 'time',
            pattern: [literals(vocabulary.months), regex(',?\\s+'), wholeNumber(1000, 2100)],
            production: (route) => {
                const month = numericLiteralAt(route, 0);
                const year = payloadAt(route, 2, 'numeral')?.value;
                return month === undefined || year === undefined ? null : { kind: 'calendar', year, month };
            },
        }),
        rule({
            name: 'ISO date (yyyy-mm-dd, optional hh:mm)',
            dimension: 'time',
            pattern: [regex('(\\d{4})-(\\d{2})-(\\d{2})(?:[t ](\\d{2}):(\\d{2}))?')],
            production: (route) => {
                const [year, month, day, hour, minute] = [1, 2, 3, 4, 5].map((group) => {
                    const raw = groupAt(route, 0, group);
                    return raw === undefined ? undefined : Number.parseInt(raw, 10);
                });
                if (year === undefined || month === undefined || day === undefined) return null;
                const date = instant(year, month, day);
                if (!date || hour === undefined || minute === undefined) return date;
                return hour < 24 && minute < 60 ? { ...date, hour, minute, grain: 'minute' } : null;
            },
        }),

        // Relative
        rule({
            name: 'this|next|last <time-grain>',
            dimension: 'time',
            pattern: [regex('(this|current|next|coming|last|past|previous)\\s+'), dimension('timeGrain')],
            production: (route) => {
                const word = groupAt(route, 0)?.toLowerCase();
                const grain = payloadAt(route, 1, 'timeGrain')?.grain;
                if (word === undefined || grain === undefined) return null;
                const amount = word === 'this' || word === 'current' ? 0 : word === 'next' || word === 'coming' ? 1 : -1;
                return { kind: 'relative', amount, grain, truncate: true };
            },
        }),
        rule({
            name: 'in <duration>',
            dimension: 'time',
            pattern: [regex('in\\s+'), dimension('duration')],
            production: (route) => {
                const duration = payloadAt(route, 1, 'duration');
                return duration && { kind: 'relative', amount: duration.value, grain: duration.grain, truncate: false };
            },
        }),
        rule({
            name: '<duration> ago',
            dimension: 'time',
            pattern: [dimension('duration'), regex('\\s+ago')],
            production: (route) => {
                const duration = payloadAt(route, 0, 'duration');
                return duration && { kind: 'relative', amount: -duration.value, grain: duration.grain, truncate: false };
            },
        }),
        rule({
            name: '<duration> from now',
            dimension: 'time',
            pattern: [dimension('duration'), regex('\\s+(?:from\\s+now|later|hence)')],
            production: (route) => {
                const duration = payloadAt(route, 0, 'duration');
                return duration && { kind: 'relative', amount: duration.value, grain: duration.grain, truncate: false };
            },
        }),

        // Clock
        rule({
            name: 'hh:mm',
            dimension: 'time',
            pattern: [regex('([01]?\\d|2[0-3]):([0-5]\\d)')],
            production: (route) => {
                const hour = groupAt(route, 0, 1);
                const minute = groupAt(route, 0, 2);
                if (hour === undefined || minute === undefined) return null;
                return { kind: 'clock', hour: Number.parseInt(hour, 10), minute: Number.parseInt(minute, 10) };
            },
        }),
        rule({
            name: '<hour> am|pm',
            dimension: 'time',
            pattern: [wholeNumber(1, 12), regex('\\s*([ap])\\.?m\\.?')],
            production: (route) => {
                const hour = payloadAt(route, 0, 'numeral')?.value;
                const meridiem = meridiemOf(groupAt(route, 1));
                return hour === undefined ? null : { kind: 'clock', hour, meridiem };
            },
        }),
        rule({
            name: '<hh:mm> am|pm',
            dimension: 'time',
            pattern: [
                dimension('time', (time) => time.kind === 'clock' && time.meridiem === undefined && time.hour >= 1 && time.hour <= 12),
                regex('\\s*([ap])\\.?m\\.?'),
            ],
            production: (route) => {
                const clock = payloadAt(route, 0, 'time');
                const meridiem = meridiemOf(groupAt(route, 1));
                return clock?.kind === 'clock' ? { ...clock, meridiem } : null;
            },
        }),
        rule({
            name: "<hour> o'clock",
            dimension: 'time',
            pattern: [wholeNumber(1, 12), regex("\\s*o'?clock")],
            production: (route) => {
                const hour = payloadAt(route, 0, 'numeral')?.value;
                return hour === undefined ? null : { kind: 'clock', hour };
            },
        }),
        rule({
            name: 'noon, midnight',
            dimension: 'time',
            pattern: [literals({ noon: 12, midday: 12, midnight: 0 })],
            production: (route) => {
                const hour = numericLiteralAt(route, 0);
                if (hour === undefined) return null;
                return hour === 12 ? { kind: 'clock', hour, meridiem: 'pm' } : { kind: 'clock', hour };
            },
        }),
        rule({
            name: 'at <hour>',
            dimension: 'time',
            pattern: [regex('at\\s+'), wholeNumber(0, 23)],
            production: (route) => {
                const hour = payloadAt(route, 1, 'numeral')?.value;
                return hour === undefined ? null : { kind: 'clock', hour };
            },
        }),
        rule({
            name: 'at <time-of-day>',
            dimension: 'time',
            pattern: [regex('at\\s+'), dimension('time', isClock)],
            production: (route) => payloadAt(route, 1, 'time'),
        }),

        // Combinations
        rule({
            name: '<day> <time-of-day>',
            dimension: 'time',
            pattern: [dimension('time', isDay), regex(',?\\s+'), dimension('time', isClock)],
            production: (route) => {
                const date = payloadAt(route, 0, 'time');
                const clock = payloadAt(route, 2, 'time');
                return date && clock && isDay(date) && isClock(clock) ? { kind: 'intersect', date, clock } : null;
            },
        }),
        rule({
            name: '<time-of-day> <day>',
            dimension: 'time',
            pattern: [dimension('time', isClock), regex(',?\\s+'), dimension('time', isDay)],
            production: (route) => {
                const clock = payloadAt(route, 0, 'time');
                const date = payloadAt(route, 2, 'time');
                return date && clock && isDay(date) && isClock(clock) ? { kind: 'intersect', date, clock } : null;
            },
        }),
        rule({
            name: 'from <time> to <time>',
            dimension: 'time',
            pattern: [
                regex('from\\s+'),
                dimension('time', isPoint),
                regex('\\s*(?:-|to|until|till)\\s*'),
                dimension('time', isPoint),
            ],
            production: (route) => interval(payloadAt(route, 1, 'time'), payloadAt(route, 3, 'time')),
        }),
        rule({
            name: 'between <time> and <time>',
            dimension: 'time',
            pattern: [
                regex('between\\s+'),
                dimension('time', isPoint),
                regex('\\s+and\\s+'),
                dimension('time', isPoint),
            ],
            production: (route) => interval(payloadAt(route, 1, 'time'), payloadAt(route, 3, 'time')),
        }),
        rule({
            name: '<time> - <time>',
            dimension: 'time',
            pattern: [
                dimension('time', isPoint),
                regex('\\s*(?:-|to|until|till|through)\\s*'),
                dimension('time', isPoint),
            ],
            production: (route) => interval(payloadAt(route, 0, 'time'), payloadAt(route, 2, 'time')),
        }),
        rule({
            name: 'after <time>',
            dimension: 'time',
            pattern: [regex('(?:after|since)\\s+'), dimension('time', isPoint)],
            production: (route) => {
                const anchor = payloadAt(route, 1, 'time');
                return anchor && isPoint(anchor) ? { kind: 'open', direction: 'after', anchor } : null;
            },
        }),
        rule({
            name: 'before <time>',
            dimension: 'time',
            pattern: [regex('(?:before|until|till|by)\\s+'), dimension('time', isPoint)],
            production: (route) => {
                const anchor = payloadAt(route, 1, 'time');
                return anchor && isPoint(anchor) ? { kind: 'open', direction: 'before', anchor } : null;
            },
        }),
    ];
}

function monthDay(month: number | undefined, dayOfMonth: number | undefined): CalendarTime | null {
    if (month === undefined || dayOfMonth === undefined || !isValidDate(2000, month, dayOfMonth)) {
        return null;
    }
    return { kind: 'calendar', month, dayOfMonth };
}

function interval(from: TimeData | undefined, to: TimeData | undefined): TimeData | null {
    return from && to && isPoint(from) && isPoint(to) ? { kind: 'interval', from, to } : null;
}

// ============================================================================
// Numeric Dates
// ============================================================================

export type DateOrder = 'day-first' | 'month-first';

/** dd/mm[/yyyy] or mm/dd[/yyyy], depending on the region */
export function slashDateRules(order: DateOrder): Rule[] {
    return [
        rule({
            name: `numeric date (${order})`,
            dimension: 'time',
            pattern: [regex('(\\d{1,2})/(\\d{1,2})(?:/(\\d{4}|\\d{2}))?')],
            production: (route) => {
                const first = groupAt(route, 0, 1);
                const second = groupAt(route, 0, 2);
                const yearText = groupAt(route, 0, 3);
                if (first === undefined || second === undefined) return null;

                const [day, month] =
                    order === 'day-first'
                        ? [Number.parseInt(first, 10), Number.parseInt(second, 10)]
                        : [Number.parseInt(second, 10), Number.parseInt(first, 10)];

                if (yearText === undefined) {
                    return monthDay(month, day);
                }
                const year = Number.parseInt(yearText, 10) + (yearText.length === 2 ? 2000 : 0);
                return instant(year, month, day);
            },
        }),
    ];
}
