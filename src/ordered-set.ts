/**
 * @module container-ops/ordered-set
 * @description
 * Sorted, duplicate-free set on top of `functional-red-black-tree`.
 * The tree is persistent; every mutation swaps in the new root, so the
 * set itself behaves like a mutable `Set` with O(log N) has/add/delete.
 */

import createTree from 'functional-red-black-tree';

import { assertKey, compareKeys, isKey, type Comparator } from './compare';

type Tree<T> = ReturnType<typeof createTree<T, T>>;

export class OrderedSet<T> {
    #tree: Tree<T>;
    readonly comparator: Comparator<T>;

    constructor(values?: Iterable<T>, comparator: Comparator<T> = compareKeys) {
        this.comparator = comparator;
        this.#tree = createTree<T, T>(comparator);
        if (values) for (const v of values) this.add(v);
    }

    get size(): number { return this.#tree.length; }
    isEmpty(): boolean { return this.#tree.length === 0; }

    // Values the default order cannot place were never inserted, so they are simply absent.
    #find(value: T) {
        if (this.comparator === compareKeys && !isKey(value)) return undefined;
        return this.#tree.find(value);
    }

    has(value: T): boolean { return this.#find(value)?.valid === true; }

    /** The stored element equal to `value` under the comparator. */
    get(value: T): T | undefined {
        const it = this.#find(value);
        return it?.valid ? it.value : undefined;
    }

    /** In-order rank of `value`, or -1 when absent. */
    indexOf(value: T): number {
        const it = this.#find(value);
        return it?.valid ? it.index : -1;
    }

    /** @throws TypeError when the default comparator cannot place `value`. */
    add(value: T): this {
        if (this.comparator === compareKeys) assertKey(value);
        if (!this.has(value)) this.#tree = this.#tree.insert(value, value);
        return this;
    }

    delete(value: T): boolean {
        if (!this.has(value)) return false;
        this.#tree = this.#tree.remove(value);
        return true;
    }

    clear(): this {
        this.#tree = createTree<T, T>(this.comparator);
        return this;
    }

    first(): T | undefined { return this.isEmpty() ? undefined : this.#tree.values[0]; }
    last(): T | undefined { return this.isEmpty() ? undefined : this.#tree.values[this.#tree.length - 1]; }

    values(): T[] { return this.#tree.values; }
    *[Symbol.iterator](): Iterator<T> { yield* this.#tree.values; }

    toString(): string {
        return `OrderedSet{${this.#tree.values.map(v => String(v)).join(', ')}}`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
