/**
 * Complexity-stratified API namespaces.
 *
 * - `query.*` — O(1) operations (one character, or a prebuilt map)
 * - `scan.*` — O(n) operations (walks over the whole sequence)
 */

export { query } from './query.ts';
export { scan } from './scan.ts';
