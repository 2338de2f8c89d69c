/**
 * Wrap a generator factory so every `for..of` starts a fresh pass.
 * A bare generator object is single-use.
 */
export function restartable<T>(factory: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: factory };
}
