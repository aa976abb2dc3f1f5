/**
 * Spanwise - Token Pool
 *
 * Every token found so far for one document, indexed by start offset and
 * deduplicated on (span, dimension, payload). The pool only grows; matchers
 * read a frozen view taken at the start of each pass.
 */

import type { Token } from './types.js';

/** Read-only view the matcher works against */
export interface PoolView {
    readonly size: number;
    startingAt(offset: number): readonly Token[];
    /** Distinct token start offsets, ascending */
    starts(): readonly number[];
}

class FrozenPool implements PoolView {
    private readonly byStart: ReadonlyMap<number, readonly Token[]>;
    private readonly offsets: readonly number[];

    constructor(byStart: ReadonlyMap<number, readonly Token[]>, public readonly size: number) {
        this.byStart = byStart;
        this.offsets = [...byStart.keys()].sort((a, b) => a - b);
    }

    startingAt(offset: number): readonly Token[] {
        return this.byStart.get(offset) ?? [];
    }

    starts(): readonly number[] {
        return this.offsets;
    }
}

export class TokenPool implements PoolView {
    private readonly byStart = new Map<number, Token[]>();
    private readonly keys = new Set<string>();
    private readonly ordered: Token[] = [];

    get size(): number {
        return this.ordered.length;
    }

    has(key: string): boolean {
        return this.keys.has(key);
    }

    /** Returns false, leaving the pool untouched, when the token is already present */
    insert(token: Token): boolean {
        if (this.keys.has(token.key)) {
            return false;
        }
        this.keys.add(token.key);
        this.ordered.push(token);

        const bucket = this.byStart.get(token.span.start);
        if (bucket) {
            bucket.push(token);
        } else {
            this.byStart.set(token.span.start, [token]);
        }
        return true;
    }

    startingAt(offset: number): readonly Token[] {
        return this.byStart.get(offset) ?? [];
    }

    starts(): readonly number[] {
        return [...this.byStart.keys()].sort((a, b) => a - b);
    }

    /** Tokens in insertion order */
    all(): readonly Token[] {
        return [...this.ordered];
    }

    snapshot(): PoolView {
        const copy = new Map<number, readonly Token[]>();
        for (const [offset, tokens] of this.byStart) {
            copy.set(offset, [...tokens]);
        }
        return new FrozenPool(copy, this.size);
    }
}
