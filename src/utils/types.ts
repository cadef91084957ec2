/**
 * Shared type utilities
 */

/** Callable type - function or object with call method */
export type Callable<TArgs extends unknown[] = unknown[], TReturn = unknown> =
  | ((...args: TArgs) => TReturn)
  | { call: (...args: TArgs) => TReturn };

/** Resolve a callable to its return type */
export function resolveCallable<TArgs extends unknown[], TReturn>(
  callable: Callable<TArgs, TReturn>,
  ...args: TArgs
): TReturn {
  if (typeof callable === 'function') {
    return callable(...args);
  }
  return callable.call(...args);
}

/** Check if value is a plain object */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/** Check if value is null or undefined */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}
