import { Collection } from '../../records/collection';
import { defineRecord, type RecordValue } from '../../records/record-type';

export const Person = defineRecord<{ name: string; tags: string[] }>()({
  name: 'Person',
  fields: { name: {}, tags: {} }
});

export const Tag = defineRecord<{ id: number; label: string }>()({
  name: 'Tag',
  fields: { id: {}, label: {} },
  primaryKey: ['id']
});

/**
 * `email` compares case-insensitively through its hook; `seenAt` is
 * extraneous.
 */
export const Member = defineRecord<{
  id: string;
  email: string;
  role: string;
  seenAt: string;
}>()({
  name: 'Member',
  fields: {
    id: {},
    email: {
      compareAs: value =>
        typeof value === 'string' ? value.toLowerCase() : value
    },
    role: {},
    seenAt: { extraneous: true }
  },
  primaryKey: ['id']
});

/** Identified by its id together with a list of names. */
export const Alias = defineRecord<{
  id: number;
  names: string[];
  note: string;
}>()({
  name: 'Alias',
  fields: { id: {}, names: {}, note: {} },
  primaryKey: ['id', 'names']
});

export const Address = defineRecord<{ city: string; street: string }>()({
  name: 'Address',
  fields: { city: {}, street: {} }
});

export const Team = defineRecord<{
  name: string;
  address: RecordValue;
  members: Collection<RecordValue>;
  labels: Record<string, string>;
}>()({
  name: 'Team',
  fields: { name: {}, address: {}, members: {}, labels: {} }
});

/** Two unrelated declarations sharing the `id` field. */
export const Account = defineRecord<{ id: number; owner: string }>()({
  name: 'Account',
  fields: { id: {}, owner: {} }
});

export const Profile = defineRecord<{ id: number; nickname: string }>()({
  name: 'Profile',
  fields: { id: {}, nickname: {} }
});

export function members(...items: RecordValue[]): Collection<RecordValue> {
  return Collection.list(items, { name: 'Members', itemType: Member });
}
