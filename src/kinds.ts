/**
 * @module container-ops/kinds
 * @description
 * Closed classification of the containers the facade knows how to search.
 * Every operation switches on the tag returned by {@link classify}; anything
 * that is not one of the keyed kinds falls back to the sequential strategy.
 */

import { OrderedMap } from './ordered-map';
import { OrderedSet } from './ordered-set';

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

export type ContainerKind =
    | 'sequential'
    | 'ordered-set'
    | 'hashed-set'
    | 'ordered-map'
    | 'hashed-map';

export type AnySet<T> = ReadonlySet<T> | OrderedSet<T>;
export type AnyMap<K, V> = ReadonlyMap<K, V> | OrderedMap<K, V>;

/** Sets whose contents can be changed in place. */
export type KeyedSet<T> = Set<T> | OrderedSet<T>;
/** Maps whose contents can be changed in place. */
export type KeyedMap<K, V> = Map<K, V> | OrderedMap<K, V>;

/** Containers `add`, `addAll` and `remove` accept for single items. */
export type MutableContainer<T> = T[] | KeyedSet<T>;

/** The part of a map a query reads: its keys. Matches `Map` and `OrderedMap` for any value type. */
export interface KeyLookup<K> extends Iterable<unknown> {
    has(key: K): boolean;
    keys(): Iterable<K>;
}

/** An `items` argument: a literal list, any iterable, or a map whose keys are the items. */
export type Items<T> = Iterable<T> | KeyLookup<T>;

export type Classified =
    | { readonly kind: 'sequential'; readonly container: Iterable<unknown> }
    | { readonly kind: 'ordered-set'; readonly container: OrderedSet<unknown> }
    | { readonly kind: 'hashed-set'; readonly container: Set<unknown> }
    | { readonly kind: 'ordered-map'; readonly container: OrderedMap<unknown, unknown> }
    | { readonly kind: 'hashed-map'; readonly container: Map<unknown, unknown> };

// ============================================================================
// 2. DISPATCH
// ============================================================================

export function classify(container: Iterable<unknown>): Classified {
    if (container instanceof Map) return { kind: 'hashed-map', container };
    if (container instanceof Set) return { kind: 'hashed-set', container };
    if (container instanceof OrderedMap) return { kind: 'ordered-map', container };
    if (container instanceof OrderedSet) return { kind: 'ordered-set', container };
    return { kind: 'sequential', container };
}

export function kindOf(container: Iterable<unknown>): ContainerKind {
    return classify(container).kind;
}

/** Items of a container as the facade sees them: keys for maps, elements otherwise. */
export function itemsOf(container: Iterable<unknown>): Iterable<unknown> {
    const c = classify(container);
    switch (c.kind) {
        case 'hashed-map': return c.container.keys();
        case 'ordered-map': return c.container.keys();
        default: return c.container;
    }
}
