/**
 * @module token
 * @description
 * Removal handles for `Bag`.
 *
 * A token is a nanosecond reading of the monotonic clock, wrapped so that it is
 * never mixed up with plain numbers. It remembers its minter, since two minters
 * may hand out the same reading. Tokens from one minter are strictly
 * increasing, which keeps a bag's slots sorted by token without any extra work.
 */

// ============================================================================
// 1. TOKEN
// ============================================================================

export class Token {
    readonly value: bigint;
    /** Minter that produced this token; `null` for tokens built by hand. */
    readonly minter: TokenMinter | null;

    constructor(value: bigint, minter: TokenMinter | null = null) {
        this.value = value;
        this.minter = minter;
    }

    equals(other: Token): boolean {
        return this.value === other.value;
    }

    /**
     * Three-way comparison by minted value.
     * @returns -1, 0 or 1.
     */
    compare(other: Token): number {
        if (this.value === other.value) return 0;
        return this.value < other.value ? -1 : 1;
    }

    toString(): string { return `Token(${this.value})`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 2. MINTING
// ============================================================================

export type Clock = () => bigint;

const monotonicClock: Clock = () => process.hrtime.bigint();

/**
 * Produces strictly increasing tokens.
 *
 * If the clock has not advanced past the last minted value (coarse resolution,
 * or two mints within the same tick), `mint()` reads it again until it has.
 */
export class TokenMinter {
    private readonly _clock: Clock;
    private _last: bigint | null = null;

    constructor(clock: Clock = monotonicClock) {
        this._clock = clock;
    }

    /** Value of the most recently minted token, or `null` before the first mint. */
    get last(): bigint | null { return this._last; }

    mint(): Token {
        let now = this._clock();
        const last = this._last;
        if (last !== null) {
            while (now <= last) now = this._clock();
        }
        this._last = now;
        return new Token(now, this);
    }
}

/**
 * Minter shared by every bag that is not given its own.
 * Tokens are unique across all of those bags, not only within one.
 */
export const defaultMinter = new TokenMinter();
