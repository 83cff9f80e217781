/**
 * @module container-ops
 * Uniform find/contains/count/add/remove over arrays, sets and maps,
 * dispatched to the cheapest native operation each container offers.
 */

export {
    END,
    find,
    contains,
    containsAll,
    containsAny,
    count,
    inFirstButNotInSecond,
    add,
    addAll,
    remove,
} from './operations';
export type { End, Position } from './operations';

export { kindOf } from './kinds';
export type {
    AnyMap,
    AnySet,
    ContainerKind,
    Items,
    KeyedMap,
    KeyedSet,
    KeyLookup,
    MutableContainer,
} from './kinds';

export { OrderedSet } from './ordered-set';
export { OrderedMap } from './ordered-map';
export { assertKey, compareKeys, isKey } from './compare';
export type { Comparator, Key } from './compare';
