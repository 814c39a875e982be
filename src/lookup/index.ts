// Lookup module exports
export { LookupTable, parseLookupLines } from './LookupTable';
export { splitCsvLine } from './csv';
export * from './types';
