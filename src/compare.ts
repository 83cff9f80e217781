/**
 * @module container-ops/compare
 * @description
 * Default total order for the ordered containers.
 *
 * * Contracts:
 * - Supported key universe: boolean | number | bigint | string | Date | Array (recursive).
 * - Type groups sort before values: booleans < numbers < bigints < strings < dates < sequences.
 * - NaN and invalid dates have no position in the order and are rejected.
 * - Any other key needs an explicit comparator.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/** Keys `compareKeys` can order without help. */
export type Key =
    | boolean
    | number
    | bigint
    | string
    | Date
    | ReadonlyArray<Key>;

/** Negative if a < b, positive if a > b, 0 if a and b are the same key. */
export type Comparator<T> = (a: T, b: T) => number;

// ============================================================================
// 2. TYPE GROUPS
// ============================================================================

// -1 for values outside the key universe.
function keyRank(v: unknown): number {
    switch (typeof v) {
        case 'boolean': return 0;
        case 'number': return Number.isNaN(v) ? -1 : 1;
        case 'bigint': return 2;
        case 'string': return 3;
    }
    if (v instanceof Date) return Number.isNaN(v.getTime()) ? -1 : 4;
    if (Array.isArray(v)) return 5;
    return -1;
}

function unsupported(v: unknown): TypeError {
    if (typeof v === 'number') return new TypeError('NaN is not supported as a key');
    if (v instanceof Date) return new TypeError('Invalid Date is not supported as a key');
    return new TypeError(`Unsupported key type: ${typeof v}. Pass a comparator for this container.`);
}

function rankOf(v: unknown): number {
    const rank = keyRank(v);
    if (rank < 0) throw unsupported(v);
    return rank;
}

/** True when `compareKeys` can place `v`, elements of sequences included. */
export function isKey(v: unknown): v is Key {
    if (keyRank(v) < 0) return false;
    return !Array.isArray(v) || v.every(isKey);
}

/** @throws TypeError naming the first part of `v` that `compareKeys` cannot place. */
export function assertKey(v: unknown): void {
    rankOf(v);
    if (Array.isArray(v)) for (const e of v) assertKey(e);
}

function compareSequences(a: ReadonlyArray<unknown>, b: ReadonlyArray<unknown>): number {
    const len = a.length;
    if (len !== b.length) return len - b.length;
    for (let i = 0; i < len; i++) {
        const diff = compareKeys(a[i], b[i]);
        if (diff !== 0) return diff;
    }
    return 0;
}

// ============================================================================
// 3. COMPARATOR
// ============================================================================

/**
 * Total order over {@link Key}.
 * -0 and 0 compare equal, matching the SameValueZero equality of `Set` and `Map`.
 * Sequences order by length first, then element by element.
 *
 * @throws TypeError for NaN, invalid dates and values outside the key universe.
 */
export function compareKeys(a: unknown, b: unknown): number {
    // Identity (also settles -0 vs 0)
    if (a === b) {
        rankOf(a);
        return 0;
    }

    const rankA = rankOf(a);
    const rankB = rankOf(b);
    if (rankA !== rankB) return rankA - rankB;

    if (typeof a === 'boolean') return a ? 1 : -1;
    if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : 1;
    if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : 1;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;
    if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
    if (Array.isArray(a) && Array.isArray(b)) return compareSequences(a, b);

    return 0;
}
