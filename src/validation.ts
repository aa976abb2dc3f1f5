import { z } from 'zod';
import { isRepresentable, isValidTimeZone } from './calendar.js';
import type { OverlapPolicy, TieBreak } from './constants.js';
import type { DimensionRegistry } from './dimensions.js';
import { parseLocale } from './registry.js';
import type { Dimension, ResolutionContext } from './types.js';
import { InvalidRequestError } from './types.js';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const ReferenceTimeSchema = z
    .union([z.date(), z.string().min(1), z.number()])
    .transform((value) => new Date(value))
    .superRefine((date, ctx) => {
        const time = date.getTime();
        if (Number.isNaN(time)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid reference time' });
        } else if (!isRepresentable(time)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Reference time must fall within years 1-9999' });
        }
    });

const ParseRequestSchema = z.object({
    text: z.string().refine((text) => !LONE_SURROGATE.test(text), {
        message: 'Text contains unpaired surrogate code units',
    }),
    locale: z.string().min(1).optional(),
    referenceTime: ReferenceTimeSchema.optional(),
    timezone: z
        .string()
        .min(1)
        .refine(isValidTimeZone, { message: 'Unknown time zone' })
        .optional(),
    dimensions: z.array(z.string().min(1)).optional(),
    withLatent: z.boolean().optional(),
    maxPasses: z.number().int().positive().optional(),
    maxInvocations: z.number().int().positive().optional(),
    timeoutMs: z.number().positive().optional(),
});

export type ParseRequest = z.input<typeof ParseRequestSchema>;

export interface RequestDefaults {
    readonly locale: string;
    readonly timezone: string;
    readonly withLatent: boolean;
    readonly maxPasses: number;
    readonly maxInvocations?: number;
    readonly timeoutMs?: number;
    readonly tieBreak: TieBreak;
    readonly overlap: OverlapPolicy;
}

export interface NormalizedRequest {
    readonly text: string;
    readonly context: ResolutionContext;
    /** Only one dimension was asked for explicitly */
    readonly singleDimension: boolean;
    readonly withLatent: boolean;
    readonly maxPasses: number;
    readonly maxInvocations?: number;
    readonly timeoutMs?: number;
    readonly tieBreak: TieBreak;
    readonly overlap: OverlapPolicy;
}

function formatZodErrors(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

/**
 * Validate a parse request and fill in defaults. The returned context is
 * frozen: nothing downstream may change it.
 */
export function normalizeRequest(
    raw: unknown,
    dimensions: DimensionRegistry,
    defaults: RequestDefaults,
    now: () => Date = () => new Date()
): NormalizedRequest {
    const result = ParseRequestSchema.safeParse(raw);
    if (!result.success) {
        throw new InvalidRequestError('Invalid parse request', formatZodErrors(result.error));
    }
    const request = result.data;

    const requested: Dimension[] = [];
    const unknown: string[] = [];
    for (const name of request.dimensions ?? []) {
        if (dimensions.has(name)) {
            requested.push(name);
        } else {
            unknown.push(`dimensions: unknown dimension "${name}"`);
        }
    }
    if (unknown.length > 0) {
        throw new InvalidRequestError('Invalid parse request', unknown);
    }

    const selected = requested.length > 0 ? [...new Set(requested)] : dimensions.names();
    const maxInvocations = request.maxInvocations ?? defaults.maxInvocations;
    const timeoutMs = request.timeoutMs ?? defaults.timeoutMs;

    const context: ResolutionContext = Object.freeze({
        locale: parseLocale(request.locale ?? defaults.locale),
        reference: request.referenceTime ?? now(),
        timezone: request.timezone ?? defaults.timezone,
        dimensions: Object.freeze(selected),
    });

    return {
        text: request.text,
        context,
        singleDimension: requested.length > 0 && selected.length === 1,
        withLatent: request.withLatent ?? defaults.withLatent,
        maxPasses: request.maxPasses ?? defaults.maxPasses,
        ...(maxInvocations !== undefined && { maxInvocations }),
        ...(timeoutMs !== undefined && { timeoutMs }),
        tieBreak: defaults.tieBreak,
        overlap: defaults.overlap,
    };
}
