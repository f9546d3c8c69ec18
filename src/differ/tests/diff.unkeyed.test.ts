import { describe, expect, test } from 'vitest';

import { createDiffRunner, createUnchangedRunner } from './helpers';
import type { DiffInput } from './helpers';
import { resolveScenarioInput, row } from './test-utils';
import type { EntryRow, TestScenario } from './types';

/**
 * Unkeyed sequences and mappings.
 * Focus: multiset matching by normalized value, occurrence counting, and
 * the value equality used for members.
 */
describe('Unkeyed collections: multiset matching of sequences and mappings.', () => {
  describe('Sequences', () => {
    const run = createDiffRunner();

    const scenarios: Array<TestScenario<DiffInput, EntryRow[]>> = [
      {
        id: 'Multiset Correctness',
        description:
          'One extra "x" in base and one extra "y" in other; duplicates are not collapsed.',
        input: { base: ['x', 'x', 'y'], other: ['x', 'y', 'y'] },
        expected: [row('REMOVED', '[1]', ''), row('ADDED', '', '[2]')]
      },
      {
        id: 'Reordering',
        description: 'Order does not matter.',
        input: { base: ['a', 'b'], other: ['b', 'a'] },
        expected: []
      },
      {
        id: 'Normalized Members',
        description: 'Members are compared after whitespace collapsing.',
        input: { base: ['  a   b '], other: ['a b'] },
        expected: []
      },
      {
        id: 'Set Members',
        description: 'Set members report the uniform null key.',
        input: () => ({
          base: new Set(['a', 'b']),
          other: new Set(['a', 'c'])
        }),
        expected: [row('REMOVED', '[*]', ''), row('ADDED', '', '[*]')]
      },
      {
        id: 'Special Numbers',
        description: 'NaN matches NaN and -0 matches 0.',
        input: { base: [NaN, -0], other: [0, NaN] },
        expected: []
      },
      {
        id: 'Structured Members',
        description: 'Plain objects match by content, arrays by order.',
        input: {
          base: [{ k: 1 }, [1, 2]],
          other: [[2, 1], { k: 1 }]
        },
        expected: [row('REMOVED', '[1]', ''), row('ADDED', '', '[0]')]
      },
      {
        id: 'Dates',
        description: 'Dates match by timestamp.',
        input: () => ({
          base: [new Date(0), new Date(1000)],
          other: [new Date(1000)]
        }),
        expected: [row('REMOVED', '[0]', '')]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Mappings', () => {
    const run = createDiffRunner();

    const scenarios: Array<TestScenario<DiffInput, EntryRow[]>> = [
      {
        id: 'Duplicate Values',
        description: 'Two keys holding "x" against one key holding "x".',
        input: { base: { a: 'x', b: 'x' }, other: { c: 'x' } },
        expected: [row('REMOVED', '.b', '')]
      },
      {
        id: 'Moved Value',
        description: 'A value under another key is not a change.',
        input: () => ({
          base: new Map([['a', 1]]),
          other: new Map([['b', 1]])
        }),
        expected: []
      },
      {
        id: 'Numeric Map Key',
        description: 'Numeric keys render as indices.',
        input: () => ({
          base: new Map([[7, 'x']]),
          other: new Map<number, string>()
        }),
        expected: [row('REMOVED', '[7]', '')]
      },
      {
        id: 'Quoted Key',
        description: 'Keys that are not identifiers render quoted.',
        input: { base: { 'odd key': 1 }, other: {} },
        expected: [row('REMOVED', '["odd key"]', '')]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Unchanged reporting', () => {
    const run = createUnchangedRunner();

    const scenarios: Array<TestScenario<DiffInput, EntryRow[]>> = [
      {
        id: 'Matched After Changes',
        description:
          'UNCHANGED entries follow REMOVED and ADDED, in base order.',
        input: { base: ['a', 'b'], other: ['b', 'c'] },
        expected: [
          row('REMOVED', '[0]', ''),
          row('ADDED', '', '[1]'),
          row('UNCHANGED', '[1]', '[0]')
        ]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });
});
