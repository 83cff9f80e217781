import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { OrderedMap } from '../src/ordered-map';

describe('OrderedMap', () => {
    test('iterates in key order', () => {
        const m = new OrderedMap([[3, 'c'], [1, 'a'], [2, 'b']]);
        assert.equal(m.size, 3);
        assert.deepEqual(m.keys(), [1, 2, 3]);
        assert.deepEqual(m.values(), ['a', 'b', 'c']);
        assert.deepEqual(m.entries(), [[1, 'a'], [2, 'b'], [3, 'c']]);
        assert.deepEqual([...m], [[1, 'a'], [2, 'b'], [3, 'c']]);
        assert.equal(m.toString(), 'OrderedMap{1 => a, 2 => b, 3 => c}');
    });

    test('set overwrites without growing', () => {
        const m = new OrderedMap([[1, 'a'], [2, 'b']]);
        m.set(2, 'B');
        assert.equal(m.size, 2);
        assert.equal(m.get(2), 'B');
        assert.equal(m.get(9), undefined);
    });

    test('later constructor entries overwrite earlier ones', () => {
        const m = new OrderedMap([[1, 'a'], [1, 'z']]);
        assert.equal(m.size, 1);
        assert.equal(m.get(1), 'z');
    });

    test('an overwritten key keeps its stored identity', () => {
        const ci = (a: string, b: string) => a.toLowerCase().localeCompare(b.toLowerCase());
        const m = new OrderedMap<string, number>([['Key', 1]], ci);
        m.set('KEY', 2);
        assert.deepEqual(m.keys(), ['Key']);
        assert.deepEqual(m.entry('key'), ['Key', 2]);
        assert.equal(m.entry('other'), undefined);
    });

    test('delete / indexOf / has', () => {
        const m = new OrderedMap([[10, true], [20, false], [30, true]]);
        assert.equal(m.indexOf(30), 2);
        assert.equal(m.indexOf(15), -1);
        assert.equal(m.delete(20), true);
        assert.equal(m.delete(20), false);
        assert.equal(m.has(20), false);
        assert.equal(m.indexOf(30), 1);
    });

    test('undefined values are still present', () => {
        const m = new OrderedMap<string, undefined>([['x', undefined]]);
        assert.equal(m.has('x'), true);
        assert.deepEqual(m.entry('x'), ['x', undefined]);
    });

    test('clear', () => {
        const m = new OrderedMap([[1, 1]]);
        assert.equal(m.clear().size, 0);
        assert.equal(m.isEmpty(), true);
    });

    test('keys the default order cannot place are absent, not errors', () => {
        const m = new OrderedMap([[1, 'a']]);
        assert.equal(m.has(NaN), false);
        assert.equal(m.get(NaN), undefined);
        assert.equal(m.entry(NaN), undefined);
        assert.equal(m.indexOf(NaN), -1);
        assert.equal(m.delete(NaN), false);
        assert.equal(m.size, 1);
    });

    test('setting such a key still throws, even on an empty map', () => {
        assert.throws(() => new OrderedMap<number, string>().set(NaN, 'x'), /NaN is not supported as a key/);
        assert.throws(() => new OrderedMap([[NaN, 1]]), TypeError);
    });
});
