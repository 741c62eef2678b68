/**
 * Consumes `iterable` `size` items at a time, yielding consecutive groups.
 * A short trailing group is dropped unless `keepRemainder` is set.
 *
 * [...partition([0, 1, 2, 3, 4, 5, 6, 7], 3)]        // [[0, 1, 2], [3, 4, 5]]
 * [...partition([0, 1, 2, 3, 4, 5, 6, 7], 3, true)]  // [[0, 1, 2], [3, 4, 5], [6, 7]]
 */
export function* partition<T>(iterable: Iterable<T>, size = 3, keepRemainder = false): Generator<T[], void, undefined> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Group size must be a positive integer, got ${size}`);
  }
  let group: T[] = [];
  for (const item of iterable) {
    group.push(item);
    if (group.length === size) {
      yield group;
      group = [];
    }
  }
  if (keepRemainder && group.length > 0) {
    yield group;
  }
}
