import { type Mock, vi } from 'vitest';
import { createDefaultDimensionRegistry } from '../src/dimensions.js';
import { type CompiledRule, compileRule, type Rule } from '../src/rule.js';
import type { Dimension, Logger, PayloadOf, TokenOf } from '../src/types.js';
import { tokenKey } from '../src/utils.js';

export const REFERENCE = '2026-10-18T09:00:00Z';

export function makeToken<D extends Dimension>(
    dimension: D,
    start: number,
    end: number,
    payload: PayloadOf<D>,
    overrides: Partial<Pick<TokenOf<D>, 'rule' | 'ruleIndex' | 'pass' | 'latent'>> = {}
): TokenOf<D> {
    const span = { start, end };
    return {
        span,
        dimension,
        payload,
        rule: overrides.rule ?? 'test',
        ruleIndex: overrides.ruleIndex ?? 0,
        pass: overrides.pass ?? 1,
        latent: overrides.latent ?? false,
        key: tokenKey(span, dimension, payload),
    };
}

export function numeralToken(start: number, end: number, value: number, grain?: number): TokenOf<'numeral'> {
    return makeToken('numeral', start, end, {
        value,
        multipliable: false,
        ...(grain !== undefined && { grain }),
    });
}

export function compileAll(rules: readonly Rule[]): CompiledRule[] {
    const dimensions = createDefaultDimensionRegistry();
    return rules.map((definition, index) => {
        const result = compileRule(definition, index, (name) => dimensions.has(name));
        if (!result.ok) {
            throw new Error(`${definition.name}: ${result.issues.join('; ')}`);
        }
        return result.rule;
    });
}

export interface SpyLogger extends Logger {
    readonly debug: Mock<(message: string) => void>;
    readonly info: Mock<(message: string) => void>;
    readonly warn: Mock<(message: string) => void>;
    readonly error: Mock<(message: string) => void>;
}

export function spyLogger(): SpyLogger {
    return {
        debug: vi.fn<(message: string) => void>(),
        info: vi.fn<(message: string) => void>(),
        warn: vi.fn<(message: string) => void>(),
        error: vi.fn<(message: string) => void>(),
    };
}
