export { createMemoryDocument } from './memory.js';
export type { MemoryDocumentOptions } from './memory.js';
export { createSpreadsheetDocument, readWorkbookPages } from './spreadsheet.js';
export type { DocumentPage, StatementDocument } from './types.js';
