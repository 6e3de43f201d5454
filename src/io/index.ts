export { TableSource } from './source';
export type { RowStream } from './source';
export * from './csv';
