/**
 * Spanwise - Configuration
 *
 * Extractor settings from SPANWISE_* environment variables, optionally read
 * from a .env file. Anything unset falls back to DEFAULTS and LIMITS.
 */

import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { isValidTimeZone } from './calendar.js';
import type { OverlapPolicy, TieBreak } from './constants.js';
import { DEFAULTS, LIMITS, OVERLAP_POLICIES, TIE_BREAKS } from './constants.js';
import type { LogLevel } from './types.js';
import { ConfigError } from './types.js';

export interface SpanwiseConfig {
    readonly locale: string;
    readonly timezone: string;
    readonly maxPasses: number;
    /** Unset: no invocation budget */
    readonly maxInvocations?: number;
    readonly logLevel: LogLevel;
    readonly tieBreak: TieBreak;
    readonly overlap: OverlapPolicy;
    readonly withLatent: boolean;
}

export interface LoadConfigOptions {
    /** Defaults to process.env */
    env?: Readonly<Record<string, string | undefined>>;
    /** .env file whose values apply where `env` leaves a variable unset */
    dotenvPath?: string;
}

// ============================================================================
// Schema
// ============================================================================

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
    SPANWISE_LOCALE: z
        .string()
        .regex(/^[a-z]{2,3}(?:[-_][a-z]{2})?$/i, 'expected a locale like "en" or "en_GB"')
        .default(DEFAULTS.locale),
    SPANWISE_TIMEZONE: z
        .string()
        .refine(isValidTimeZone, { message: 'unknown time zone' })
        .default(DEFAULTS.timezone),
    SPANWISE_MAX_PASSES: positiveInt(LIMITS.maxPasses),
    SPANWISE_MAX_INVOCATIONS: z.coerce.number().int().positive().optional(),
    SPANWISE_LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULTS.logLevel),
    SPANWISE_TIE_BREAK: z.enum(TIE_BREAKS).default(DEFAULTS.tieBreak),
    SPANWISE_OVERLAP_POLICY: z.enum(OVERLAP_POLICIES).default(DEFAULTS.overlap),
    SPANWISE_WITH_LATENT: z
        .enum(['true', 'false'])
        .transform((value) => value === 'true')
        .default(DEFAULTS.withLatent ? 'true' : 'false'),
});

// ============================================================================
// Loading
// ============================================================================

function readDotenv(path: string): Record<string, string> {
    try {
        return dotenv.parse(readFileSync(path));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Cannot read ${path}`, [`dotenvPath: ${reason}`]);
    }
}

/**
 * Load extractor settings
 *
 * @example
 * loadConfig({ env: { SPANWISE_LOCALE: 'en_GB' } }).locale  // 'en_GB'
 */
export function loadConfig(options: LoadConfigOptions = {}): SpanwiseConfig {
    const fromFile = options.dotenvPath ? readDotenv(options.dotenvPath) : {};
    const env = options.env ?? process.env;

    // Blank values count as unset
    const merged: Record<string, string> = {};
    for (const key of Object.keys(EnvSchema.shape)) {
        const value = env[key] ?? fromFile[key];
        if (value !== undefined && value.trim() !== '') {
            merged[key] = value.trim();
        }
    }

    const result = EnvSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError(
            'Invalid Spanwise configuration',
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const config = result.data;
    return {
        locale: config.SPANWISE_LOCALE,
        timezone: config.SPANWISE_TIMEZONE,
        maxPasses: config.SPANWISE_MAX_PASSES,
        ...(config.SPANWISE_MAX_INVOCATIONS !== undefined && { maxInvocations: config.SPANWISE_MAX_INVOCATIONS }),
        logLevel: config.SPANWISE_LOG_LEVEL,
        tieBreak: config.SPANWISE_TIE_BREAK,
        overlap: config.SPANWISE_OVERLAP_POLICY,
        withLatent: config.SPANWISE_WITH_LATENT,
    };
}

/** Settings used when an extractor is created without a config */
export function defaultConfig(): SpanwiseConfig {
    return {
        locale: DEFAULTS.locale,
        timezone: DEFAULTS.timezone,
        maxPasses: LIMITS.maxPasses,
        logLevel: DEFAULTS.logLevel,
        tieBreak: DEFAULTS.tieBreak,
        overlap: DEFAULTS.overlap,
        withLatent: DEFAULTS.withLatent,
    };
}
