/**
 * Spanwise - Time Resolution
 *
 * Anchors time payloads to the reference instant in the request timezone.
 * Recurring patterns resolve to their next occurrences; intervals resolve to
 * a `from` and an exclusive `to`.
 */

import {
    addGrain,
    fieldsOf,
    formatIso,
    fromWallTime,
    isRepresentable,
    isValidDate,
    toWallTime,
    truncate,
    WALL,
    type WallTime,
    wallTime,
} from './calendar.js';
import { LIMITS } from './constants.js';
import type {
    CalendarTime,
    ClockTime,
    PointTime,
    ResolutionContext,
    TimeData,
    TimeGrain,
    TimeIntervalValue,
    TimePoint,
    TimeValue,
} from './types.js';
import { UnhandledVariantError } from './types.js';

interface Occurrence {
    readonly start: WallTime;
    readonly grain: TimeGrain;
}

const byStart = (a: Occurrence, b: Occurrence): number => a.start - b.start;

// ============================================================================
// Clock
// ============================================================================

/**
 * 24-hour readings of a clock time
 *
 * @example
 * clockHours({ kind: 'clock', hour: 5 })                    // [5, 17]
 * clockHours({ kind: 'clock', hour: 5, meridiem: 'pm' })    // [17]
 * clockHours({ kind: 'clock', hour: 12 })                   // [0, 12]
 */
export function clockHours(clock: ClockTime): number[] {
    const { hour, meridiem } = clock;
    if (meridiem === 'am') return [hour % 12];
    if (meridiem === 'pm') return [(hour % 12) + 12];
    if (hour === 0 || hour > 12) return [hour];
    if (hour === 12) return [0, 12];
    return [hour, hour + 12];
}

function clockGrain(clock: ClockTime): TimeGrain {
    return clock.minute === undefined ? 'hour' : 'minute';
}

function atClock(day: WallTime, hour: number, clock: ClockTime): WallTime {
    return day + hour * WALL.HOUR_MS + (clock.minute ?? 0) * WALL.MINUTE_MS;
}

function clockOccurrences(clock: ClockTime, reference: WallTime, limit: number): Occurrence[] {
    const grain = clockGrain(clock);
    const threshold = truncate(reference, grain);
    const today = truncate(reference, 'day');
    const found: Occurrence[] = [];

    for (let offset = 0; offset <= limit + 1; offset++) {
        const day = today + offset * WALL.DAY_MS;
        for (const hour of clockHours(clock)) {
            const start = atClock(day, hour, clock);
            if (start >= threshold) {
                found.push({ start, grain });
            }
        }
    }

    return found.sort(byStart).slice(0, limit);
}

// ============================================================================
// Calendar
// ============================================================================

function matchesDay(pattern: CalendarTime, wall: WallTime): boolean {
    const fields = fieldsOf(wall);
    return (
        (pattern.year === undefined || pattern.year === fields.year) &&
        (pattern.month === undefined || pattern.month === fields.month) &&
        (pattern.dayOfMonth === undefined || pattern.dayOfMonth === fields.day) &&
        (pattern.dayOfWeek === undefined || pattern.dayOfWeek === fields.weekday)
    );
}

function calendarOccurrences(pattern: CalendarTime, reference: WallTime, limit: number): Occurrence[] {
    const { year, month, dayOfMonth, dayOfWeek } = pattern;

    if (month === undefined && dayOfMonth === undefined && dayOfWeek === undefined) {
        return year === undefined ? [] : [{ start: wallTime(year, 1, 1), grain: 'year' }];
    }

    if (dayOfMonth === undefined && dayOfWeek === undefined && month !== undefined) {
        if (year !== undefined) {
            return [{ start: wallTime(year, month, 1), grain: 'month' }];
        }
        const current = fieldsOf(reference);
        const start = month >= current.month ? current.year : current.year + 1;
        return Array.from({ length: limit }, (_, i) => ({
            start: wallTime(start + i, month, 1),
            grain: 'month' as const,
        }));
    }

    const found: Occurrence[] = [];
    const first = year === undefined ? truncate(reference, 'day') : wallTime(year, 1, 1);
    const span = year === undefined ? LIMITS.calendarSearchDays : 366;

    for (let day = 0; day < span && found.length < limit; day++) {
        const start = first + day * WALL.DAY_MS;
        if (matchesDay(pattern, start)) {
            found.push({ start, grain: 'day' });
        }
    }
    return found;
}

// ============================================================================
// Occurrences
// ============================================================================

function occurrences(time: PointTime, reference: WallTime, limit: number): Occurrence[] {
    switch (time.kind) {
        case 'instant': {
            if (!isValidDate(time.year, time.month, time.day)) return [];
            return [{ start: wallTime(time.year, time.month, time.day, time.hour, time.minute), grain: time.grain }];
        }
        case 'relative': {
            const base = truncate(reference, time.truncate ? time.grain : 'second');
            return [
                {
                    start: addGrain(base, time.amount, time.grain),
                    grain: time.truncate ? time.grain : 'second',
                },
            ];
        }
        case 'calendar':
            return calendarOccurrences(time, reference, limit);
        case 'clock':
            return clockOccurrences(time, reference, limit);
        case 'intersect': {
            const threshold = truncate(reference, clockGrain(time.clock));
            const all = occurrences(time.date, reference, limit).flatMap((day) =>
                clockHours(time.clock).map((hour) => ({
                    start: atClock(truncate(day.start, 'day'), hour, time.clock),
                    grain: clockGrain(time.clock),
                }))
            );
            const upcoming = all.filter((occurrence) => occurrence.start >= threshold);
            return (upcoming.length > 0 ? upcoming : all).sort(byStart).slice(0, limit);
        }
        default:
            throw new UnhandledVariantError(time);
    }
}

// ============================================================================
// Resolution
// ============================================================================

function toPoint(occurrence: Occurrence, timezone: string): TimePoint {
    return {
        value: formatIso(fromWallTime(occurrence.start, timezone), timezone),
        grain: occurrence.grain,
    };
}

const inRange = (occurrence: Occurrence): boolean => isRepresentable(occurrence.start);

/** Null when nothing resolves, or the result falls outside years 1-9999 */
export function resolveTime(
    time: TimeData,
    context: ResolutionContext
): TimeValue | TimeIntervalValue | null {
    const { timezone } = context;
    const instant = context.reference.getTime();
    if (!isRepresentable(instant)) return null;
    const reference = toWallTime(instant, timezone);
    const limit = LIMITS.maxTimeCandidates;

    switch (time.kind) {
        case 'interval': {
            const [from] = occurrences(time.from, reference, limit);
            if (!from || !inRange(from)) return null;
            const to = occurrences(time.to, reference, limit * 4).find((o) => o.start >= from.start);
            if (!to) return null;
            const end: Occurrence = { start: addGrain(to.start, 1, to.grain), grain: to.grain };
            if (!inRange(end)) return null;
            return { type: 'interval', from: toPoint(from, timezone), to: toPoint(end, timezone) };
        }
        case 'open': {
            const [anchor] = occurrences(time.anchor, reference, limit);
            if (!anchor || !inRange(anchor)) return null;
            const point = toPoint(anchor, timezone);
            return time.direction === 'after'
                ? { type: 'interval', from: point }
                : { type: 'interval', to: point };
        }
        case 'instant':
        case 'relative':
        case 'calendar':
        case 'clock':
        case 'intersect': {
            const found = occurrences(time, reference, limit).filter(inRange);
            if (found.length === 0) return null;
            const values = found.map((occurrence) => toPoint(occurrence, timezone));
            return { type: 'value', value: values[0].value, grain: values[0].grain, values };
        }
        default:
            throw new UnhandledVariantError(time);
    }
}
