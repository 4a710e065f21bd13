/**
 * Blank = nothing usable was supplied.
 *
 * undefined, null, false, whitespace-only strings, empty arrays and empty plain
 * objects are blank. 0 is not.
 */
export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}
