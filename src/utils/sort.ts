/**
 * Ordering helpers
 * @module utils/sort
 *
 * Every sorted output of the engine uses code-unit string order so results do
 * not depend on the host locale.
 */

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
