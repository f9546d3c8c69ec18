import { describe, expect, test } from 'vitest';
import { z } from 'zod';

import { RecordValidationError } from '../../errors';
import { Collection } from '../collection';
import { collectionEntries } from '../iteration';
import { defineRecord, isRecord, recordTypeOf } from '../record-type';

const Contact = defineRecord<{ email: string; age: number }>()({
  name: 'Contact',
  fields: { email: {}, age: {} },
  schema: z.object({
    email: z.string().email(),
    age: z.number().int().nonnegative().optional()
  })
});

describe('Record types: declaration, construction and validation.', () => {
  test('[Create] stores declared fields and brands the record', () => {
    const contact = Contact.create({ email: 'kim@example.test', age: 30 });

    expect(isRecord(contact)).toBe(true);
    expect(recordTypeOf(contact)).toBe(Contact);
    expect(Contact.isInstance(contact)).toBe(true);
    expect(contact.email).toBe('kim@example.test');
    expect(Object.isFrozen(contact)).toBe(true);
  });

  test('[Unset Fields] undefined values are left unset', () => {
    const contact = Contact.create({ email: 'kim@example.test' });

    expect(Object.hasOwn(contact, 'age')).toBe(false);
  });

  test('[Schema] issues become RecordValidationError with the issue path', () => {
    try {
      Contact.create({ email: 'not-an-email' });
      expect.unreachable('create should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(RecordValidationError);
      if (error instanceof RecordValidationError) {
        expect(error.recordName).toBe('Contact');
        expect(error.issuePath).toBe('email');
      }
    }
  });

  test('[Unknown Fields] are rejected without a schema', () => {
    const Pin = defineRecord<{ code: string }>()({
      name: 'Pin',
      fields: { code: {} }
    });

    expect(() => Pin.create({ code: '1', colour: 'red' })).toThrow(
      'Unknown field "colour" for "Pin".'
    );
  });

  test('[Primary Key] is kept in declaration order', () => {
    const Seat = defineRecord<{ row: string; number: number; guest: string }>()({
      name: 'Seat',
      fields: { row: {}, number: {}, guest: {} },
      primaryKey: ['row', 'number']
    });

    expect(Seat.primaryKey).toStrictEqual(['row', 'number']);
    expect(Contact.primaryKey).toStrictEqual([]);
  });

  test('[Non Records] plain objects are not records', () => {
    expect(isRecord({ email: 'kim@example.test' })).toBe(false);
    expect(isRecord(null)).toBe(false);
  });
});

describe('Collections: kinds, keys and iteration.', () => {
  test('[List] integer keys in order', () => {
    const list = Collection.list(['a', 'b']);

    expect([...list.entries()]).toStrictEqual([
      [0, 'a'],
      [1, 'b']
    ]);
    expect(list.get(1)).toBe('b');
    expect(list.name).toBe('List');
  });

  test('[Map] string keys, last write wins', () => {
    const map = Collection.map(
      [
        ['x', 1],
        ['y', 2],
        ['x', 3]
      ],
      { name: 'Scores' }
    );

    expect([...map.entries()]).toStrictEqual([
      ['x', 3],
      ['y', 2]
    ]);
    expect(map.name).toBe('Scores');
  });

  test('[Set] null keys, duplicates dropped', () => {
    const set = Collection.set(['a', 'a', 'b']);

    expect(set.size).toBe(2);
    expect([...set.entries()]).toStrictEqual([
      [null, 'a'],
      [null, 'b']
    ]);
    expect(set.get(null)).toBe(undefined);
  });

  test.for([
    { label: 'array', container: ['a', 'b'], expected: [[0, 'a'], [1, 'b']] },
    { label: 'set', container: new Set(['a']), expected: [[null, 'a']] },
    {
      label: 'map',
      container: new Map<unknown, string>([
        ['k', 'a'],
        [true, 'b']
      ]),
      expected: [
        ['k', 'a'],
        ['true', 'b']
      ]
    },
    { label: 'object', container: { k: 'a' }, expected: [['k', 'a']] },
    { label: 'scalar', container: 42, expected: [] }
  ])('[collectionEntries] $label', ({ container, expected }) => {
    expect([...collectionEntries(container)]).toStrictEqual(expected);
  });
});
