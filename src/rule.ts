/**
 * Spanwise - Rules
 *
 * A rule is data: a pattern (ordered pattern items) plus a production that
 * turns a matched route into a payload, or declines with null/undefined.
 * Rules are compiled once, when a registry accepts them; a rule that cannot
 * compile never reaches a parse.
 */

import _ from 'lodash';
import type { LiteralValue, PatternItem, PredicateItem, RangeItem, Route } from './pattern.js';
import type { Dimension, PayloadOf } from './types.js';
import { UnhandledVariantError } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type Production<D extends Dimension> = (route: Route) => PayloadOf<D> | null | undefined;

export interface RuleOf<D extends Dimension> {
    /** Diagnostic only */
    readonly name: string;
    readonly dimension: D;
    readonly pattern: readonly PatternItem[];
    readonly production: Production<D>;
    /** Low-confidence reading, surfaced only when nothing firmer overlaps it */
    readonly latent?: boolean;
}

export type Rule = { [D in Dimension]: RuleOf<D> }[Dimension];

/** Identity helper that ties the production's payload type to the dimension */
export function rule<D extends Dimension>(definition: RuleOf<D>): RuleOf<D> {
    return definition;
}

// ============================================================================
// Compiled Form
// ============================================================================

export interface CompiledRegexItem {
    readonly kind: 'regex';
    readonly regex: RegExp;
}

export interface CompiledLiteralsItem {
    readonly kind: 'literals';
    readonly regex: RegExp;
    /** Lower-cased form → value */
    readonly values: ReadonlyMap<string, LiteralValue>;
}

export type CompiledTextItem = CompiledRegexItem | CompiledLiteralsItem;

export type CompiledItem = CompiledTextItem | PredicateItem | RangeItem;

export interface CompiledRule {
    readonly rule: Rule;
    /** Declaration order across the owning registry */
    readonly index: number;
    readonly items: readonly CompiledItem[];
    /** Built from text items only: its matches cannot change after pass 1 */
    readonly textOnly: boolean;
}

export function isCompiledTextItem(item: CompiledItem): item is CompiledTextItem {
    return item.kind === 'regex' || item.kind === 'literals';
}

const REGEX_FLAGS = 'iuy';

const ENDS_IN_LETTER = /[\p{L}\p{M}]$/u;
const ENDS_IN_DIGIT = /\p{Nd}$/u;

/**
 * A literal form that ends inside a word must end the word too, so a longer
 * form that stops mid-word gives way to a shorter one
 */
function literalAlternative(form: string): string {
    const escaped = _.escapeRegExp(form);
    if (ENDS_IN_LETTER.test(form)) return `${escaped}(?![\\p{L}\\p{M}])`;
    if (ENDS_IN_DIGIT.test(form)) return `${escaped}(?!\\p{Nd})`;
    return escaped;
}

type ItemResult = { ok: true; item: CompiledItem } | { ok: false; issue: string };

function compileItem(
    item: PatternItem,
    position: number,
    isKnownDimension: (dimension: string) => boolean
): ItemResult {
    switch (item.kind) {
        case 'regex': {
            try {
                return { ok: true, item: { kind: 'regex', regex: new RegExp(item.source, REGEX_FLAGS) } };
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                return { ok: false, issue: `item ${position}: invalid regex /${item.source}/ (${reason})` };
            }
        }
        case 'literals': {
            const forms = Object.keys(item.entries);
            if (forms.length === 0) {
                return { ok: false, issue: `item ${position}: empty literal set` };
            }
            if (forms.includes('')) {
                return { ok: false, issue: `item ${position}: empty literal form` };
            }
            const values = new Map<string, LiteralValue>();
            for (const [form, value] of Object.entries(item.entries)) {
                values.set(form.toLowerCase(), value);
            }
            const alternatives = _.sortBy(forms, (form) => -form.length).map(literalAlternative);
            return {
                ok: true,
                item: { kind: 'literals', regex: new RegExp(alternatives.join('|'), REGEX_FLAGS), values },
            };
        }
        case 'predicate':
            return isKnownDimension(item.dimension)
                ? { ok: true, item }
                : { ok: false, issue: `item ${position}: unknown dimension "${item.dimension}"` };
        case 'range':
            return item.low < item.high
                ? { ok: true, item }
                : { ok: false, issue: `item ${position}: empty range [${item.low}, ${item.high})` };
        default:
            throw new UnhandledVariantError(item);
    }
}

export type CompileResult = { ok: true; rule: CompiledRule } | { ok: false; issues: string[] };

/**
 * Validate and compile one rule. Issues are collected rather than thrown so a
 * registry can report every broken rule of a table at once.
 */
export function compileRule(
    definition: Rule,
    index: number,
    isKnownDimension: (dimension: string) => boolean
): CompileResult {
    const issues: string[] = [];

    if (definition.name.trim() === '') {
        issues.push('rule name is empty');
    }
    if (!isKnownDimension(definition.dimension)) {
        issues.push(`unknown dimension "${definition.dimension}"`);
    }
    if (definition.pattern.length === 0) {
        issues.push('pattern is empty');
    }

    const items: CompiledItem[] = [];
    definition.pattern.forEach((item, position) => {
        const result = compileItem(item, position, isKnownDimension);
        if (result.ok) {
            items.push(result.item);
        } else {
            issues.push(result.issue);
        }
    });

    if (issues.length > 0) {
        return { ok: false, issues };
    }

    return {
        ok: true,
        rule: {
            rule: definition,
            index,
            items,
            textOnly: items.every(isCompiledTextItem),
        },
    };
}
