export * from './schema.js';
export {
  RecordStore,
  type ChangeReason,
  type StoreChange,
  type StoreListener,
} from './recordStore.js';
export { LocalPersistence } from './localPersistence.js';
export {
  HEADER_ROW,
  normalizeCell,
  normalizeDate,
  encodeTable,
  decodeTable,
} from './tableCodec.js';
export {
  SORT_COLUMNS,
  isSortColumn,
  matchesSearchTerm,
  hasStatus,
  sortRecords,
  summarizeByStatus,
  submissionsByDate,
  formatRowsForClipboard,
  type SortColumn,
} from './query.js';
