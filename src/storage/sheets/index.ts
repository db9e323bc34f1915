export {
  GoogleSheetTable,
  quoteSheetName,
  type SheetTable,
  type GoogleSheetOptions,
} from './sheetsClient.js';
