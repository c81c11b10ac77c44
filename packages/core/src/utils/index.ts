export { normalizeKey, normalizeKeys } from './normalize-keys.js';
export { firstRowColumns, partitionRows } from './records.js';
