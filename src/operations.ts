/**
 * @module container-ops/operations
 * @description
 * One vocabulary for arrays, `Set`, `Map`, {@link OrderedSet} and {@link OrderedMap}.
 *
 * * Strategies:
 * - Keyed kinds (sets, maps): native lookup. O(log N) ordered, O(1) hashed.
 * - Everything else: linear scan, or scan-and-compact for removal. O(N).
 *
 * * Contracts:
 * - For a map, "item" always means key. Entries only appear where a value
 *   has to travel with the key (`add`, `addAll`, positions returned by `find`).
 * - Sequences compare by SameValueZero, like `Array.prototype.includes`.
 * - Absence is never an error: END, false or 0.
 */

import {
    classify,
    itemsOf,
    type AnyMap,
    type Classified,
    type Items,
    type KeyedMap,
    type MutableContainer,
} from './kinds';

// ============================================================================
// 1. POSITIONS
// ============================================================================

/** Returned by {@link find} when nothing matches. */
export const END: unique symbol = Symbol('END');
export type End = typeof END;

export interface Position<E> {
    /** The element, or the `[key, value]` entry for maps. */
    readonly value: E;
    /** Array index for sequences, in-order rank for ordered containers, -1 for hashed ones. */
    readonly index: number;
}

// ============================================================================
// 2. LINEAR STRATEGY
// ============================================================================

function sameValueZero(a: unknown, b: unknown): boolean {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

function findLinear(sequence: Iterable<unknown>, item: unknown): Position<unknown> | End {
    let index = 0;
    for (const value of sequence) {
        if (sameValueZero(value, item)) return { value, index };
        index++;
    }
    return END;
}

function countLinear(sequence: Iterable<unknown>, item: unknown): number {
    let n = 0;
    for (const value of sequence) {
        if (sameValueZero(value, item)) n++;
    }
    return n;
}

// Scan-and-compact: survivors slide left in order, then the tail is cut.
function removeLinear(arr: unknown[], item: unknown): void {
    const len = arr.length;
    let write = 0;
    for (let read = 0; read < len; read++) {
        if (!sameValueZero(arr[read], item)) arr[write++] = arr[read];
    }
    arr.length = write;
}

function writableSequence(c: Classified, op: string): unknown[] {
    if (c.kind === 'sequential' && Array.isArray(c.container)) return c.container;
    throw new TypeError(`Cannot ${op} a read-only ${c.kind} container`);
}

// ============================================================================
// 3. KEYED STRATEGY
// ============================================================================

function isEntry(v: unknown): v is readonly [unknown, unknown] {
    return Array.isArray(v) && v.length === 2;
}

/** Single-item add with each container's native insert semantics. */
function insert(c: Classified, item: unknown): void {
    switch (c.kind) {
        case 'sequential':
            writableSequence(c, 'add to').push(item);
            return;
        case 'hashed-set':
        case 'ordered-set':
            c.container.add(item);
            return;
        case 'hashed-map':
        case 'ordered-map': {
            if (!isEntry(item)) throw new TypeError('Items added to a map must be [key, value] entries');
            const [key, value] = item;
            if (!c.container.has(key)) c.container.set(key, value);
            return;
        }
    }
}

// ============================================================================
// 4. QUERIES
// ============================================================================

/**
 * Locates `item` in `container`.
 * Maps are searched by key and yield the stored `[key, value]` entry.
 *
 * @returns The position of the first match, or {@link END}.
 */
export function find<K, V>(container: AnyMap<K, V>, key: K): Position<readonly [K, V]> | End;
export function find<T>(container: Iterable<T>, item: T): Position<T> | End;
export function find(container: Iterable<unknown>, item: unknown): Position<unknown> | End {
    const c = classify(container);
    switch (c.kind) {
        case 'hashed-map':
            return c.container.has(item) ? { value: [item, c.container.get(item)], index: -1 } : END;
        case 'ordered-map': {
            const entry = c.container.entry(item);
            return entry ? { value: entry, index: c.container.indexOf(item) } : END;
        }
        case 'hashed-set':
            return c.container.has(item) ? { value: item, index: -1 } : END;
        case 'ordered-set': {
            const index = c.container.indexOf(item);
            return index < 0 ? END : { value: c.container.get(item), index };
        }
        case 'sequential':
            return findLinear(c.container, item);
    }
}

export function contains<K, V>(container: AnyMap<K, V>, key: K): boolean;
export function contains<T>(container: Iterable<T>, item: T): boolean;
export function contains(container: Iterable<unknown>, item: unknown): boolean {
    return find(container, item) !== END;
}

/** Every item present. Vacuously true for no items. */
export function containsAll<K, V, I extends Items<K>>(container: AnyMap<K, V>, items: I): boolean;
export function containsAll<T, I extends Items<T>>(container: Iterable<T>, items: I): boolean;
export function containsAll(container: Iterable<unknown>, items: Iterable<unknown>): boolean {
    for (const item of itemsOf(items)) {
        if (!contains(container, item)) return false;
    }
    return true;
}

/** At least one item present. False for no items. */
export function containsAny<K, V, I extends Items<K>>(container: AnyMap<K, V>, items: I): boolean;
export function containsAny<T, I extends Items<T>>(container: Iterable<T>, items: I): boolean;
export function containsAny(container: Iterable<unknown>, items: Iterable<unknown>): boolean {
    for (const item of itemsOf(items)) {
        if (contains(container, item)) return true;
    }
    return false;
}

/**
 * Number of elements equal to `item`.
 * Keyed containers hold each key at most once, so they answer 0 or 1.
 */
export function count<K, V>(container: AnyMap<K, V>, key: K): number;
export function count<T>(container: Iterable<T>, item: T): number;
export function count(container: Iterable<unknown>, item: unknown): number {
    const c = classify(container);
    if (c.kind === 'sequential') return countLinear(c.container, item);
    return c.container.has(item) ? 1 : 0;
}

/**
 * Distinct items of `first` that `second` does not contain.
 * The result is a fresh `Set`; map arguments contribute their keys.
 */
export function inFirstButNotInSecond<K, V, S extends Items<K>>(first: AnyMap<K, V>, second: S): Set<K>;
export function inFirstButNotInSecond<T, S extends Items<T>>(first: Iterable<T>, second: S): Set<T>;
export function inFirstButNotInSecond(first: Iterable<unknown>, second: Iterable<unknown>): Set<unknown> {
    const result = new Set<unknown>();
    for (const item of itemsOf(first)) {
        if (!contains(second, item)) result.add(item);
    }
    return result;
}

// ============================================================================
// 5. MUTATIONS
// ============================================================================

/**
 * Adds to a container in place.
 * - `add(array, x)` appends.
 * - `add(set, x)` inserts; no-op when present.
 * - `add(map, [k, v])` inserts only when `k` is absent.
 * - `add(map, k, v)` assigns, replacing any existing value.
 */
export function add<K, V>(map: KeyedMap<K, V>, key: K, value: V): void;
export function add<K, V>(map: KeyedMap<K, V>, entry: readonly [K, V]): void;
export function add<T>(container: MutableContainer<T>, item: T): void;
export function add(container: Iterable<unknown>, item: unknown, ...value: unknown[]): void {
    const c = classify(container);
    if (value.length === 0) {
        insert(c, item);
        return;
    }
    if (c.kind !== 'hashed-map' && c.kind !== 'ordered-map') {
        throw new TypeError(`add(container, key, value) needs a map, got a ${c.kind} container`);
    }
    c.container.set(item, value[0]);
}

/**
 * Adds each of `items` in their iteration order, as repeated {@link add} calls.
 * A map target takes `[key, value]` entries, so another map can be passed directly.
 */
export function addAll<K, V>(map: KeyedMap<K, V>, entries: Iterable<readonly [K, V]>): void;
export function addAll<T>(container: MutableContainer<T>, items: Iterable<T>): void;
export function addAll(container: Iterable<unknown>, items: Iterable<unknown>): void {
    const c = classify(container);
    // Appending an array to itself would never finish
    const source = items === container ? Array.from(items) : items;
    for (const item of source) insert(c, item);
}

/**
 * Removes `item` in place; absent items are a no-op.
 * Arrays lose every equal element and keep the order of the rest.
 */
export function remove<K, V>(map: KeyedMap<K, V>, key: K): void;
export function remove<T>(container: MutableContainer<T>, item: T): void;
export function remove(container: Iterable<unknown>, item: unknown): void {
    const c = classify(container);
    if (c.kind === 'sequential') {
        removeLinear(writableSequence(c, 'remove from'), item);
        return;
    }
    c.container.delete(item);
}
