/**
 * Complexity-stratified API namespaces.
 *
 * - `query.*`: O(1), O(log n) and single-line operations
 * - `scan.*`: O(n) operations (whole document or whole line traversals)
 */

export { query } from './query.ts';
export { scan } from './scan.ts';
