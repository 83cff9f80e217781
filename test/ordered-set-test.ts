import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { OrderedSet } from '../src/ordered-set';

const caseInsensitive = (a: string, b: string): number => {
    const x = a.toLowerCase();
    const y = b.toLowerCase();
    return x < y ? -1 : x > y ? 1 : 0;
};

describe('OrderedSet', () => {
    test('sorts and deduplicates on construction', () => {
        const s = new OrderedSet([3, 1, 2, 3]);
        assert.equal(s.size, 3);
        assert.deepEqual(s.values(), [1, 2, 3]);
        assert.deepEqual([...s], [1, 2, 3]);
        assert.equal(s.toString(), 'OrderedSet{1, 2, 3}');
    });

    test('has / indexOf', () => {
        const s = new OrderedSet(['c', 'a', 'b']);
        assert.equal(s.has('b'), true);
        assert.equal(s.has('z'), false);
        assert.equal(s.indexOf('a'), 0);
        assert.equal(s.indexOf('c'), 2);
        assert.equal(s.indexOf('z'), -1);
    });

    test('add keeps keys unique', () => {
        const s = new OrderedSet([1, 2]);
        assert.equal(s.add(2), s);
        assert.equal(s.size, 2);
        s.add(0);
        assert.deepEqual(s.values(), [0, 1, 2]);
    });

    test('delete reports whether the key was there', () => {
        const s = new OrderedSet([1, 2, 3]);
        assert.equal(s.delete(2), true);
        assert.equal(s.delete(2), false);
        assert.deepEqual(s.values(), [1, 3]);
    });

    test('first / last', () => {
        const s = new OrderedSet([5, 9, 7]);
        assert.equal(s.first(), 5);
        assert.equal(s.last(), 9);
        s.clear();
        assert.equal(s.first(), undefined);
        assert.equal(s.last(), undefined);
        assert.equal(s.isEmpty(), true);
    });

    test('clear keeps the comparator', () => {
        const s = new OrderedSet([1, 2, 3], (a, b) => b - a);
        s.clear();
        s.add(1).add(3).add(2);
        assert.deepEqual(s.values(), [3, 2, 1]);
    });

    test('custom comparator decides equality; the stored element wins', () => {
        const s = new OrderedSet(['b', 'A'], caseInsensitive);
        assert.equal(s.has('a'), true);
        assert.equal(s.get('a'), 'A');
        assert.equal(s.get('q'), undefined);
        s.add('B');
        assert.deepEqual(s.values(), ['A', 'b']);
    });

    test('default comparator rejects keys it cannot order', () => {
        assert.throws(() => new OrderedSet<object>([{}, {}]), TypeError);
    });

    test('values the default order cannot place are absent, not errors', () => {
        const s = new OrderedSet([1, 2, 3]);
        assert.equal(s.has(NaN), false);
        assert.equal(s.get(NaN), undefined);
        assert.equal(s.indexOf(NaN), -1);
        assert.equal(s.delete(NaN), false);
        assert.equal(s.size, 3);
    });

    test('adding such a value still throws, even into an empty set', () => {
        assert.throws(() => new OrderedSet<number>().add(NaN), /NaN is not supported as a key/);
        assert.throws(() => new OrderedSet([1]).add(NaN), TypeError);
    });
});
