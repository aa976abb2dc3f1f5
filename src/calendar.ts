/**
 * Spanwise - Calendar Arithmetic
 *
 * Time is resolved on "wall time": the local calendar fields of the request
 * timezone encoded as if they were UTC milliseconds. Grain arithmetic happens
 * on wall time; only the final conversion to an ISO string touches the zone.
 */

import type { TimeGrain } from './types.js';

export type WallTime = number;

const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;
const DAY_MS = 86_400_000;
const WEEK_MS = 7 * DAY_MS;

/** Years 1 through 9999, the range ISO 8601 writes with four digits */
const FIRST_INSTANT = -62_135_596_800_000;
const LAST_INSTANT = 253_402_300_799_999;

/**
 * UTC milliseconds for calendar fields. Unlike Date.UTC, years 0-99 are
 * taken literally; month and day overflow roll over as usual.
 */
function utc(year: number, monthIndex: number, day: number, hour = 0, minute = 0, second = 0): number {
    return new Date(0).setUTCFullYear(year, monthIndex, day) + hour * HOUR_MS + minute * MINUTE_MS + second * 1000;
}

/** Within years 1-9999 with a day to spare for any zone offset */
export function isRepresentable(instant: number): boolean {
    return Number.isFinite(instant) && instant >= FIRST_INSTANT + DAY_MS && instant <= LAST_INSTANT - DAY_MS;
}

// ============================================================================
// Time Zones
// ============================================================================

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    const cached = formatters.get(timeZone);
    if (cached) return cached;

    const formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        hourCycle: 'h23',
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
    });
    formatters.set(timeZone, formatter);
    return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
    try {
        formatterFor(timeZone);
        return true;
    } catch {
        return false;
    }
}

export function toWallTime(instant: number, timeZone: string): WallTime {
    const fields: Record<string, number> = {};
    for (const part of formatterFor(timeZone).formatToParts(new Date(instant))) {
        if (part.type !== 'literal') {
            fields[part.type] = Number(part.value);
        }
    }
    const millis = ((instant % 1000) + 1000) % 1000;
    return (
        utc(fields.year, fields.month - 1, fields.day, fields.hour, fields.minute, fields.second) +
        millis
    );
}

/** Offset of the zone from UTC at `instant`, in minutes */
export function offsetMinutes(instant: number, timeZone: string): number {
    return Math.round((toWallTime(instant, timeZone) - instant) / MINUTE_MS);
}

export function fromWallTime(wall: WallTime, timeZone: string): number {
    const firstGuess = offsetMinutes(wall, timeZone);
    const instant = wall - firstGuess * MINUTE_MS;
    const corrected = offsetMinutes(instant, timeZone);
    return corrected === firstGuess ? instant : wall - corrected * MINUTE_MS;
}

/**
 * ISO 8601 with the zone's offset
 *
 * @example
 * formatIso(Date.UTC(2026, 9, 18, 12), 'America/New_York')  // "2026-10-18T08:00:00.000-04:00"
 */
export function formatIso(instant: number, timeZone: string): string {
    const offset = offsetMinutes(instant, timeZone);
    const local = new Date(instant + offset * MINUTE_MS).toISOString().slice(0, -1);
    const sign = offset < 0 ? '-' : '+';
    const hours = String(Math.floor(Math.abs(offset) / 60)).padStart(2, '0');
    const minutes = String(Math.abs(offset) % 60).padStart(2, '0');
    return `${local}${sign}${hours}:${minutes}`;
}

// ============================================================================
// Wall Time Fields
// ============================================================================

export interface WallFields {
    readonly year: number;
    readonly month: number;
    readonly day: number;
    readonly hour: number;
    readonly minute: number;
    /** ISO weekday, 1 = Monday ... 7 = Sunday */
    readonly weekday: number;
}

export function fieldsOf(wall: WallTime): WallFields {
    const date = new Date(wall);
    return {
        year: date.getUTCFullYear(),
        month: date.getUTCMonth() + 1,
        day: date.getUTCDate(),
        hour: date.getUTCHours(),
        minute: date.getUTCMinutes(),
        weekday: ((date.getUTCDay() + 6) % 7) + 1,
    };
}

export function daysInMonth(year: number, month: number): number {
    return new Date(utc(year, month, 0)).getUTCDate();
}

export function isValidDate(year: number, month: number, day: number): boolean {
    return (
        Number.isInteger(year) &&
        Number.isInteger(month) &&
        Number.isInteger(day) &&
        month >= 1 &&
        month <= 12 &&
        day >= 1 &&
        day <= daysInMonth(year, month)
    );
}

export function wallTime(year: number, month: number, day: number, hour = 0, minute = 0): WallTime {
    return utc(year, month - 1, day, hour, minute);
}

// ============================================================================
// Grain Arithmetic
// ============================================================================

/** Start of the grain containing `wall`; weeks start on Monday */
export function truncate(wall: WallTime, grain: TimeGrain): WallTime {
    const date = new Date(wall);
    const year = date.getUTCFullYear();
    const month = date.getUTCMonth();
    const day = date.getUTCDate();

    switch (grain) {
        case 'second':
            return Math.floor(wall / 1000) * 1000;
        case 'minute':
            return Math.floor(wall / MINUTE_MS) * MINUTE_MS;
        case 'hour':
            return Math.floor(wall / HOUR_MS) * HOUR_MS;
        case 'day':
            return utc(year, month, day);
        case 'week':
            return utc(year, month, day) - ((date.getUTCDay() + 6) % 7) * DAY_MS;
        case 'month':
            return utc(year, month, 1);
        case 'quarter':
            return utc(year, month - (month % 3), 1);
        case 'year':
            return utc(year, 0, 1);
    }
}

function shiftMonths(wall: WallTime, months: number): WallTime {
    const date = new Date(wall);
    const target = date.getUTCMonth() + months;
    const year = date.getUTCFullYear() + Math.floor(target / 12);
    const month = ((target % 12) + 12) % 12;
    const day = Math.min(date.getUTCDate(), daysInMonth(year, month + 1));
    return utc(year, month, day) + (wall - truncate(wall, 'day'));
}

const MONTHS_PER_GRAIN: Partial<Record<TimeGrain, number>> = { month: 1, quarter: 3, year: 12 };

const MS_PER_GRAIN: Partial<Record<TimeGrain, number>> = {
    second: 1000,
    minute: MINUTE_MS,
    hour: HOUR_MS,
    day: DAY_MS,
    week: WEEK_MS,
};

/**
 * Move `amount` grains; fractional month-based amounts carry the remainder
 * over as 30-day months
 */
export function addGrain(wall: WallTime, amount: number, grain: TimeGrain): WallTime {
    const ms = MS_PER_GRAIN[grain];
    if (ms !== undefined) {
        return wall + Math.round(amount * ms);
    }
    const months = amount * (MONTHS_PER_GRAIN[grain] ?? 1);
    const whole = Math.trunc(months);
    const remainder = months - whole;
    return shiftMonths(wall, whole) + Math.round(remainder * 30 * DAY_MS);
}

export const WALL = { MINUTE_MS, HOUR_MS, DAY_MS } as const;
