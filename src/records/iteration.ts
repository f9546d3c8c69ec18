import { isPlainObject } from '../utils/type-guards';
import { Collection, type CollectionKey } from './collection';

/**
 * Views any supported container as a sequence of `[key, value]` pairs.
 *
 * | container         | key                      |
 * | ----------------- | ------------------------ |
 * | `Collection`      | its own key              |
 * | array             | index                    |
 * | `Set`             | `null` (no stable key)   |
 * | `Map`             | map key (stringified if not a string/number) |
 * | plain object      | own enumerable string key |
 *
 * Anything else yields nothing.
 */
export function* collectionEntries(
  container: unknown
): Generator<readonly [CollectionKey, unknown]> {
  if (container instanceof Collection) {
    yield* container.entries();
  } else if (Array.isArray(container)) {
    let index = 0;
    for (const item of container) {
      yield [index, item];
      index += 1;
    }
  } else if (container instanceof Set) {
    for (const item of container) yield [null, item];
  } else if (container instanceof Map) {
    for (const [key, value] of container) {
      yield [
        typeof key === 'string' || typeof key === 'number' ? key : String(key),
        value
      ];
    }
  } else if (isPlainObject(container)) {
    for (const key of Object.keys(container)) yield [key, container[key]];
  }
}
