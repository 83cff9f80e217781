/**
 * @module container-ops/ordered-map
 * @description
 * Sorted map on top of `functional-red-black-tree`. Entries are stored as
 * `[key, value]` pairs under their key, so lookups hand back the key the
 * map holds rather than the probe.
 */

import createTree from 'functional-red-black-tree';

import { assertKey, compareKeys, isKey, type Comparator } from './compare';

type Tree<K, V> = ReturnType<typeof createTree<K, readonly [K, V]>>;

export class OrderedMap<K, V> {
    #tree: Tree<K, V>;
    readonly comparator: Comparator<K>;

    constructor(entries?: Iterable<readonly [K, V]>, comparator: Comparator<K> = compareKeys) {
        this.comparator = comparator;
        this.#tree = createTree<K, readonly [K, V]>(comparator);
        if (entries) for (const [k, v] of entries) this.set(k, v);
    }

    get size(): number { return this.#tree.length; }
    isEmpty(): boolean { return this.#tree.length === 0; }

    // Keys the default order cannot place were never inserted, so they are simply absent.
    #find(key: K) {
        if (this.comparator === compareKeys && !isKey(key)) return undefined;
        return this.#tree.find(key);
    }

    has(key: K): boolean { return this.#find(key)?.valid === true; }
    get(key: K): V | undefined { return this.entry(key)?.[1]; }

    /** The stored `[key, value]` pair for `key`. */
    entry(key: K): readonly [K, V] | undefined {
        const it = this.#find(key);
        return it?.valid ? it.value : undefined;
    }

    /** In-order rank of `key`, or -1 when absent. */
    indexOf(key: K): number {
        const it = this.#find(key);
        return it?.valid ? it.index : -1;
    }

    /**
     * Inserts or overwrites. An existing key keeps its stored identity.
     * @throws TypeError when the default comparator cannot place `key`.
     */
    set(key: K, value: V): this {
        if (this.comparator === compareKeys) assertKey(key);
        const it = this.#tree.find(key);
        const current = it.valid ? it.value : undefined;
        this.#tree = current
            ? it.update([current[0], value])
            : this.#tree.insert(key, [key, value]);
        return this;
    }

    delete(key: K): boolean {
        if (!this.has(key)) return false;
        this.#tree = this.#tree.remove(key);
        return true;
    }

    clear(): this {
        this.#tree = createTree<K, readonly [K, V]>(this.comparator);
        return this;
    }

    keys(): K[] { return this.#tree.keys; }
    values(): V[] { return this.#tree.values.map(e => e[1]); }
    entries(): Array<[K, V]> { return this.#tree.values.map((e): [K, V] => [e[0], e[1]]); }
    *[Symbol.iterator](): Iterator<[K, V]> { yield* this.entries(); }

    toString(): string {
        return `OrderedMap{${this.#tree.values.map(e => `${String(e[0])} => ${String(e[1])}`).join(', ')}}`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
