import { diffIter } from '..';
import type { DiffOptionsInput } from '../types';
import { toRows } from './test-utils';
import type { EntryRow } from './types';

/**
 * Input payload for a comparison test.
 */
export type DiffInput = {
  /**
   * The base value; entry kinds are relative to it.
   */
  base: unknown;

  /**
   * The value compared against `base`.
   */
  other: unknown;

  /**
   * Optional per-scenario option values.
   */
  options?: DiffOptionsInput;
};

/**
 * A configured comparison returning flattened rows.
 */
export type DiffRunner = (input: DiffInput) => EntryRow[];

/**
 * Creates a runner with a fixed set of base options.
 *
 * Per-scenario options are merged first, so the base options win. Each
 * suite thereby enforces the configuration it is about.
 *
 * @param baseOptions - Applied on every run.
 */
export function createDiffRunner(
  baseOptions: DiffOptionsInput = {}
): DiffRunner {
  return (input: DiffInput) =>
    toRows(
      diffIter(input.base, input.other, {
        ...input.options,
        ...baseOptions
      })
    );
}

/**
 * Runner that also reports `UNCHANGED` entries.
 */
export function createUnchangedRunner(): DiffRunner {
  return createDiffRunner({ unchanged: true });
}

/**
 * Runner comparing differently declared records by field name.
 */
export function createDuckTypeRunner(): DiffRunner {
  return createDiffRunner({ duckType: true });
}
