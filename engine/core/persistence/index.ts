/**
 * GridCalc Engine - Persistence Module
 */

export {
  SheetDocumentSchema,
  PersistedCellSchema,
  formatIssues,
  type SheetDocument,
  type PersistedCell,
} from './SheetDocument.js';
export { serializeSheet, deserializeSheet, type DeserializeResult } from './SheetSerializer.js';
export { parseCsv, quoteCsvField, exportCsv, importCsv, type CsvImportResult } from './Csv.js';
export { saveSheet, loadSheet, saveCsv, loadCsv, type SaveResult } from './FileRepository.js';
