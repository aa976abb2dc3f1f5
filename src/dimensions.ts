/**
 * Spanwise - Dimensions
 *
 * Each dimension registers the dimensions its rules consume and a pure
 * conversion from payload to caller-facing value. New dimensions plug in
 * here without touching the matcher, the pass driver or selection.
 */

import { SECONDS_PER_GRAIN } from './constants.js';
import { resolveTime } from './time.js';
import type { Dimension, PayloadOf, ResolutionContext, ResolvedValue, Token } from './types.js';
import { isTokenOf } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface DimensionDefinition<D extends Dimension> {
    readonly name: D;
    /** Dimensions whose tokens this dimension's rules consume */
    readonly dependencies?: readonly Dimension[];
    /** Pure; returning null drops the token */
    readonly resolve: (payload: PayloadOf<D>, context: ResolutionContext) => ResolvedValue | null;
}

interface RegisteredDimension {
    readonly name: Dimension;
    readonly dependencies: readonly Dimension[];
    readonly resolveToken: (token: Token, context: ResolutionContext) => ResolvedValue | null;
}

// ============================================================================
// Registry
// ============================================================================

export class DimensionRegistry {
    private readonly entries = new Map<string, RegisteredDimension>();

    register<D extends Dimension>(definition: DimensionDefinition<D>): this {
        const { name, resolve } = definition;
        this.entries.set(name, {
            name,
            dependencies: definition.dependencies ?? [],
            resolveToken: (token, context) =>
                isTokenOf(token, name) ? resolve(token.payload, context) : null,
        });
        return this;
    }

    has(name: string): name is Dimension {
        return this.entries.has(name);
    }

    /** Registered dimensions in registration order */
    names(): Dimension[] {
        return [...this.entries.values()].map((entry) => entry.name);
    }

    /**
     * The requested dimensions plus everything they depend on, transitively
     *
     * @example
     * registry.closure(['duration'])  // ['duration', 'numeral', 'timeGrain']
     */
    closure(dimensions: readonly Dimension[]): Dimension[] {
        const seen = new Set<Dimension>();
        const queue = [...dimensions];

        while (queue.length > 0) {
            const next = queue.shift();
            if (next === undefined || seen.has(next)) continue;
            seen.add(next);
            queue.push(...(this.entries.get(next)?.dependencies ?? []));
        }
        return [...seen];
    }

    resolve(token: Token, context: ResolutionContext): ResolvedValue | null {
        return this.entries.get(token.dimension)?.resolveToken(token, context) ?? null;
    }
}

// ============================================================================
// Built-in Dimensions
// ============================================================================

const numeric = (value: number, unit?: string): ResolvedValue => ({
    type: 'value',
    value,
    ...(unit !== undefined && { unit }),
});

export function registerBuiltinDimensions(registry: DimensionRegistry): DimensionRegistry {
    return registry
        .register({ name: 'numeral', resolve: (numeral) => numeric(numeral.value) })
        .register({ name: 'ordinal', dependencies: ['numeral'], resolve: (ordinal) => numeric(ordinal.value) })
        .register({ name: 'timeGrain', resolve: ({ grain }) => ({ type: 'value', value: grain }) })
        .register({
            name: 'duration',
            dependencies: ['numeral', 'timeGrain'],
            resolve: ({ value, grain }) => ({
                type: 'value',
                value,
                unit: grain,
                normalized: { value: value * SECONDS_PER_GRAIN[grain], unit: 'second' },
            }),
        })
        .register({
            name: 'time',
            dependencies: ['numeral', 'ordinal', 'duration', 'timeGrain'],
            resolve: resolveTime,
        })
        .register({ name: 'distance', dependencies: ['numeral'], resolve: (m) => numeric(m.value, m.unit) })
        .register({ name: 'temperature', dependencies: ['numeral'], resolve: (m) => numeric(m.value, m.unit) })
        .register({ name: 'volume', dependencies: ['numeral'], resolve: (m) => numeric(m.value, m.unit) })
        .register({
            name: 'quantity',
            dependencies: ['numeral'],
            resolve: ({ value, unit, product }) => ({
                type: 'value',
                value,
                unit,
                ...(product !== undefined && { product }),
            }),
        })
        .register({
            name: 'finance',
            dependencies: ['numeral'],
            resolve: ({ value, currency }) => numeric(value, currency),
        })
        .register({ name: 'phoneNumber', resolve: ({ value }) => ({ type: 'value', value }) })
        .register({ name: 'email', resolve: ({ value }) => ({ type: 'value', value }) })
        .register({ name: 'url', resolve: ({ value, domain }) => ({ type: 'value', value, domain }) })
        .register({ name: 'regexMatch', resolve: ({ value }) => ({ type: 'value', value }) });
}

export function createDefaultDimensionRegistry(): DimensionRegistry {
    return registerBuiltinDimensions(new DimensionRegistry());
}
