/**
 * @module token-bag
 * Order-preserving bag with O(1) insertion and removal by token.
 */

import { Bag } from './bag';
import type { BagOptions } from './bag';
import type { Token } from './token';

export { Bag, DEFAULT_RECENT_WINDOW } from './bag';
export type { BagOptions } from './bag';
export { Token, TokenMinter, defaultMinter } from './token';
export type { Clock } from './token';

/** A filled bag together with its removal tokens, in insertion order. */
export interface FilledBag<T> {
    bag: Bag<T>;
    tokens: Token[];
}

export function emptyBag<T>(options?: BagOptions): Bag<T> { return new Bag<T>(options); }

export function fromIterable<T>(iterable: Iterable<T>, options?: BagOptions): FilledBag<T> {
    const bag = new Bag<T>(options);
    const tokens: Token[] = [];
    for (const value of iterable) tokens.push(bag.insert(value));
    return { bag, tokens };
}

/**
 * Bag of `values` built with the default options (shared minter, default
 * recent window). Use `fromIterable` to pass `BagOptions`.
 */
export function bagOf<T>(...values: T[]): FilledBag<T> { return fromIterable(values); }
