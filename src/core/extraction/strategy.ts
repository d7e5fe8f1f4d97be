/**
 * Ordered field-resolution strategies: first non-null result wins
 */

export type FieldStrategy<T> = () => T | null;

export interface NamedStrategy<T> {
  name: string;
  run: FieldStrategy<T>;
}

export interface Resolved<T> {
  value: T;
  strategy: string;
}

/**
 * Runs strategies in order and returns the first hit with the name of the
 * strategy that produced it
 */
export function resolveField<T>(
  strategies: ReadonlyArray<NamedStrategy<T>>,
): Resolved<T> | null {
  for (const s of strategies) {
    const value = s.run();
    if (value !== null) return { value, strategy: s.name };
  }
  return null;
}

/**
 * Same as resolveField, value only
 */
export function firstOf<T>(strategies: ReadonlyArray<FieldStrategy<T>>): T | null {
  for (const run of strategies) {
    const value = run();
    if (value !== null) return value;
  }
  return null;
}
