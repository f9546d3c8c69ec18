/**
 * Scenario input for table-driven tests.
 *
 * A builder function is accepted where an input is easier to assemble in
 * code (records, collections, cyclic values). Prefer named builders defined
 * next to the scenario table over inline lambdas.
 */
export type ScenarioInput<T> = T | (() => T);

/**
 * One row of a table-driven comparison test.
 *
 * @template TInput - The input payload (e.g. {@link DiffInput}).
 * @template TExpected - The expected result.
 */
export type TestScenario<TInput = unknown, TExpected = unknown> = {
  /**
   * Short, unique identifier shown in the test name.
   */
  id: string;

  /**
   * What the scenario exercises and why the expected result follows.
   */
  description: string;

  input: ScenarioInput<TInput>;

  expected: TExpected;
};

/**
 * Flattened change entry used for assertions: the kind's display name and
 * both rendered paths.
 */
export type EntryRow = {
  kind: string;
  base: string;
  other: string;
};
