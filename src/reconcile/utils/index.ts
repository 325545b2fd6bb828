// formatting
export { formatTable } from './formatting/formatTable.ts';
export { sanitize } from './formatting/sanitize.ts';
export { scoreMatrixToTsv, toTsv } from './formatting/toTsv.ts';

// loader
export { loadInput, parseInput } from './loader/loadInput.ts';
export type { ReconcileInput } from './loader/loadInput.ts';
