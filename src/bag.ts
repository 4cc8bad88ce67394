/**
 * @module bag
 * @description
 * An order-preserving, duplicate-tolerant collection with removal by token.
 *
 * * Features:
 * - O(1) amortized `insert`, returning a `Token`.
 * - `remove` scans the most recent slots first, then binary-searches the rest.
 * - Elements need no equality, ordering or hash.
 *
 * * Contracts:
 * - Slots are appended only, with strictly increasing tokens, so the slot array
 *   is always sorted by token. The binary search depends on this.
 * - Iterators see the contents as they were when the iterator was created.
 *   A bag only copies its slots when mutated while an iterator is unfinished.
 * - Tokens minted by another minter never match, even when the values agree.
 */

import { defaultMinter } from './token';
import type { Token, TokenMinter } from './token';

// ============================================================================
// 1. OPTIONS
// ============================================================================

/** Number of trailing slots checked before falling back to binary search. */
export const DEFAULT_RECENT_WINDOW = 5;

export interface BagOptions {
    /** Size of the tail window scanned first by `remove()`. */
    recentWindow?: number;
    /** Token source. Defaults to the process-wide clock minter. */
    minter?: TokenMinter;
}

interface Slot<T> {
    readonly value: T;
    readonly token: Token;
}

/**
 * Walks a fixed slot array. `release` runs once, when the walk finishes or is
 * cut short through `return()`.
 */
class SlotIterator<T> implements IterableIterator<T> {
    private _index = 0;
    private _released = false;

    constructor(
        private readonly _slots: readonly Slot<T>[],
        private readonly _release: () => void,
    ) {}

    next(): IteratorResult<T> {
        if (this._index < this._slots.length) {
            return { value: this._slots[this._index++].value, done: false };
        }
        this._finish();
        return { value: undefined, done: true };
    }

    return(): IteratorResult<T> {
        this._index = this._slots.length;
        this._finish();
        return { value: undefined, done: true };
    }

    [Symbol.iterator](): IterableIterator<T> { return this; }

    private _finish() {
        if (this._released) return;
        this._released = true;
        this._release();
    }
}

// ============================================================================
// 2. BAG
// ============================================================================

export class Bag<T> implements Iterable<T> {
    private _slots: Slot<T>[] = [];
    /** Unfinished iterators over `_slots`; while non-zero, mutations copy first. */
    private _readers: number = 0;
    private readonly _recentWindow: number;
    private readonly _minter: TokenMinter;

    constructor(options: BagOptions = {}) {
        const window = options.recentWindow ?? DEFAULT_RECENT_WINDOW;
        if (!Number.isInteger(window) || window < 0) {
            throw new RangeError(`InvalidOption: recentWindow must be a non-negative integer, got ${window}`);
        }
        this._recentWindow = window;
        this._minter = options.minter ?? defaultMinter;
    }

    private _mutableSlots(): Slot<T>[] {
        if (this._readers > 0) {
            this._slots = this._slots.slice();
            this._readers = 0;
        }
        return this._slots;
    }

    get size(): number { return this._slots.length; }
    isEmpty(): boolean { return this._slots.length === 0; }

    get startIndex(): number { return 0; }
    get endIndex(): number { return this._slots.length; }
    indexAfter(index: number): number { return index + 1; }

    /**
     * Appends `value` and returns the token that removes this occurrence.
     */
    insert(value: T): Token {
        const token = this._minter.mint();
        this._mutableSlots().push({ value, token });
        return token;
    }

    /**
     * Removes the occurrence inserted with `token`.
     * Unknown, already removed or foreign tokens are ignored.
     * @returns `true` if a slot was removed.
     */
    remove(token: Token): boolean {
        if (token.minter !== this._minter) return false;
        const index = this._indexOf(token);
        if (index < 0) return false;
        this._mutableSlots().splice(index, 1);
        return true;
    }

    private _indexOf(token: Token): number {
        const arr = this._slots;
        const len = arr.length;
        const windowStart = Math.max(0, len - this._recentWindow);

        // Recent slots first: most removals target them.
        for (let i = len - 1; i >= windowStart; i--) {
            if (arr[i].token.equals(token)) return i;
        }

        // Binary search over [0, windowStart)
        let low = 0, high = windowStart;
        while (low < high) {
            const mid = (low + high) >>> 1;
            const cmp = arr[mid].token.compare(token);
            if (cmp === 0) return mid;
            if (cmp < 0) low = mid + 1;
            else high = mid;
        }
        return -1;
    }

    clear(): this {
        this._slots = [];
        this._readers = 0;
        return this;
    }

    /**
     * Element at `index` in insertion order.
     * @throws RangeError unless `0 <= index < size` and `index` is an integer.
     */
    at(index: number): T {
        const arr = this._slots;
        if (!Number.isInteger(index) || index < 0 || index >= arr.length) {
            throw new RangeError(`IndexOutOfRange: index ${index} is outside [0, ${arr.length})`);
        }
        return arr[index].value;
    }

    values(): IterableIterator<T> {
        const slots = this._slots;
        this._readers++;
        return new SlotIterator(slots, () => {
            // Readers of an array already replaced by a copy no longer count.
            if (this._slots === slots) this._readers--;
        });
    }

    [Symbol.iterator](): IterableIterator<T> { return this.values(); }

    toArray(): T[] { return this._slots.map(slot => slot.value); }

    toString(): string {
        return `Bag(${this._slots.map(slot => String(slot.value)).join(', ')})`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
