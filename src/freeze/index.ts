/**
 * freeze — Recursive Object.freeze for the plain records this library hands out.
 *
 * Date instances are left as they are: freezing a Date does not stop
 * `setTime`, so records that share a Date with a table copy it instead.
 */

export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || value instanceof Date) return value
  for (const child of Object.values(value)) deepFreeze(child)
  return Object.freeze(value)
}
