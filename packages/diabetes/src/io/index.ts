/**
 * File import and export
 */

export {
  geneticFileSchema,
  parseGeneticData,
  loadGeneticData,
  type GeneticFile,
} from "./genetic-import.js";

export {
  EXPORT_FORMATS,
  isExportFormat,
  flattenRecord,
  toRows,
  collectColumns,
  rowsToCsv,
  exportResults,
  type ExportFormat,
  type ExportValue,
  type ExportRow,
} from "./export.js";
