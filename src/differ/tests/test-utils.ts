import type { ChangeEntry } from '../change-entry';
import type { EntryRow, ScenarioInput } from './types';

function isBuilder<T>(input: ScenarioInput<T>): input is () => T {
  return typeof input === 'function';
}

/**
 * Resolves a scenario input that may be a direct value or a builder.
 */
export function resolveScenarioInput<T>(input: ScenarioInput<T>): T {
  return isBuilder(input) ? input() : input;
}

/**
 * Flattens entries into plain rows so whole results can be compared with
 * `toStrictEqual`.
 */
export function toRows(entries: Iterable<ChangeEntry>): EntryRow[] {
  return [...entries].map(entry => ({
    kind: entry.kind.displayName,
    base: entry.base.path,
    other: entry.other.path
  }));
}

/**
 * Builds an expected row. The root renders as an empty path.
 */
export function row(kind: string, base: string, other: string): EntryRow {
  return { kind, base, other };
}
