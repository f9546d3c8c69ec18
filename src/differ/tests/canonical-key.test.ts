import { describe, expect, test } from 'vitest';

import { Collection } from '../../records/collection';
import { canonicalKey, valuesEqual } from '../canonical-key';
import { OccurrenceMultiset } from '../multiset';
import { Tag } from './fixtures';
import { resolveScenarioInput } from './test-utils';
import type { TestScenario } from './types';

type Pair = readonly [left: unknown, right: unknown];

function selfReferencing(): Pair {
  const left: unknown[] = ['a'];
  left.push(left);
  const right: unknown[] = ['a'];
  right.push(right);
  return [left, right];
}

const sharedFn = () => 1;

describe('Canonical keys: structural equality for multiset lookups.', () => {
  const scenarios: Array<TestScenario<Pair, boolean>> = [
    {
      id: 'Types Kept Apart',
      description: '1 and "1" are different values.',
      input: [1, '1'],
      expected: false
    },
    {
      id: 'BigInt Versus Number',
      description: '1n and 1 are different values.',
      input: [1n, 1],
      expected: false
    },
    {
      id: 'NaN',
      description: 'NaN equals NaN.',
      input: [NaN, NaN],
      expected: true
    },
    {
      id: 'Signed Zero',
      description: '-0 equals 0.',
      input: [-0, 0],
      expected: true
    },
    {
      id: 'Infinity',
      description: 'Infinity and -Infinity stay apart.',
      input: [Infinity, -Infinity],
      expected: false
    },
    {
      id: 'Registered Symbols',
      description: 'Symbol.for with the same key is the same value.',
      input: [Symbol.for('record-delta.test'), Symbol.for('record-delta.test')],
      expected: true
    },
    {
      id: 'Unique Symbols',
      description: 'Two symbols sharing a description stay apart.',
      input: [Symbol('k'), Symbol('k')],
      expected: false
    },
    {
      id: 'Registered Versus Unique Symbol',
      description: 'A registered symbol differs from a unique one of that name.',
      input: [Symbol.for('k'), Symbol('k')],
      expected: false
    },
    {
      id: 'Null Versus Undefined',
      description: 'null and undefined are different values.',
      input: [null, undefined],
      expected: false
    },
    {
      id: 'Object Key Order',
      description: 'Plain objects ignore key order.',
      input: [
        { a: 1, b: 2 },
        { b: 2, a: 1 }
      ],
      expected: true
    },
    {
      id: 'Array Order',
      description: 'Arrays keep their order.',
      input: [
        [1, 2],
        [2, 1]
      ],
      expected: false
    },
    {
      id: 'Set Order',
      description: 'Sets ignore insertion order.',
      input: () => [new Set([1, 2]), new Set([2, 1])],
      expected: true
    },
    {
      id: 'Map Versus Object',
      description: 'A Map and a plain object with the same entries differ.',
      input: () => [new Map([['a', 1]]), { a: 1 }],
      expected: false
    },
    {
      id: 'Dates',
      description: 'Dates compare by timestamp.',
      input: () => [new Date(5), new Date(5)],
      expected: true
    },
    {
      id: 'Regular Expressions',
      description: 'Patterns compare by source and flags.',
      input: () => [/a+/g, /a+/i],
      expected: false
    },
    {
      id: 'Boxed Primitives',
      description: 'A boxed string equals its primitive.',
      input: () => [new String('x'), 'x'],
      expected: true
    },
    {
      id: 'Records',
      description: 'Records compare by type and field values.',
      input: () => [
        Tag.create({ id: 1, label: 'a' }),
        Tag.create({ label: 'a', id: 1 })
      ],
      expected: true
    },
    {
      id: 'Record Versus Object',
      description: 'A record never equals a plain object.',
      input: () => [Tag.create({ id: 1 }), { id: 1 }],
      expected: false
    },
    {
      id: 'Set Collections',
      description: 'Set collections ignore member order.',
      input: () => [Collection.set(['a', 'b']), Collection.set(['b', 'a'])],
      expected: true
    },
    {
      id: 'Functions',
      description: 'Functions are equal only to themselves.',
      input: () => [sharedFn, () => 1],
      expected: false
    },
    {
      id: 'Cycles',
      description: 'Self-referencing structures of the same shape are equal.',
      input: selfReferencing,
      expected: true
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const [left, right] = resolveScenarioInput(input);
    expect(valuesEqual(left, right)).toBe(expected);
  });

  test('[Stable] the same value always yields the same key', () => {
    expect(canonicalKey(sharedFn)).toBe(canonicalKey(sharedFn));
    expect(canonicalKey(['a', 1])).toBe('["arr",["s","a"],["n",1]]');
  });

  test('[Symbols] unique symbols keep one key, registered ones use their name', () => {
    const marker = Symbol('marker');

    expect(canonicalKey(marker)).toBe(canonicalKey(marker));
    expect(canonicalKey(Symbol.for('k'))).toBe('["sym","for","k"]');
  });
});

describe('OccurrenceMultiset: occurrence-counted matching.', () => {
  function build(items: readonly string[]): OccurrenceMultiset<string> {
    const set = new OccurrenceMultiset<string>();
    items.forEach((item, index) => set.add(item, index, item));
    return set;
  }

  test('[Occurrences] repeated identities are counted, not collapsed', () => {
    const set = build(['x', 'x', 'y']);

    expect(set.size).toBe(3);
    expect([...set].map(entry => entry.occurrence)).toStrictEqual([0, 1, 0]);
  });

  test('[Difference] keeps insertion order and original keys', () => {
    const base = build(['x', 'x', 'y']);
    const other = build(['x', 'y', 'y']);

    expect(
      base.difference(other).map(entry => entry.collectionKey)
    ).toStrictEqual([1]);
    expect(
      other.difference(base).map(entry => entry.collectionKey)
    ).toStrictEqual([2]);
  });

  test('[Intersection] pairs the n-th occurrences of each side', () => {
    const base = build(['x', 'y', 'x']);
    const other = build(['x', 'x']);

    expect(
      base
        .intersection(other)
        .map(([mine, theirs]) => [mine.collectionKey, theirs.collectionKey])
    ).toStrictEqual([
      [0, 0],
      [2, 1]
    ]);
  });
});
