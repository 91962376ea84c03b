/**
 * Result export to CSV, JSON or Excel
 */

import { writeFile } from "fs/promises";
import ExcelJS from "exceljs";
import { formatCsvValue } from "../parsers/csv-utils.js";

export const EXPORT_FORMATS = ["csv", "json", "excel"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type ExportValue = string | number | boolean | null;

export type ExportRow = Record<string, ExportValue>;

export function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Flatten nested objects and arrays into one row with dotted column names
 */
export function flattenRecord(value: Record<string, unknown>, prefix = ""): ExportRow {
  const row: ExportRow = {};

  const visit = (current: unknown, key: string) => {
    if (current === undefined) return;
    if (current === null || typeof current === "string" || typeof current === "boolean") {
      row[key] = current;
    } else if (typeof current === "number") {
      row[key] = Number.isFinite(current) ? current : null;
    } else if (current instanceof Date) {
      row[key] = current.toISOString();
    } else if (Array.isArray(current)) {
      current.forEach((item, i) => visit(item, key ? `${key}.${i}` : String(i)));
    } else if (isPlainObject(current)) {
      for (const [childKey, child] of Object.entries(current)) {
        visit(child, key ? `${key}.${childKey}` : childKey);
      }
    } else {
      row[key] = String(current);
    }
  };

  visit(value, prefix);
  return row;
}

/**
 * Turn results into table rows: an array gives one row per element,
 * an object gives a single flattened row
 */
export function toRows(results: unknown): ExportRow[] {
  const items = Array.isArray(results) ? results : [results];
  return items.map((item) => (isPlainObject(item) ? flattenRecord(item) : flattenRecord({ value: item })));
}

/**
 * Column names in first-seen order
 */
export function collectColumns(rows: readonly ExportRow[]): string[] {
  const columns = new Set<string>();
  rows.forEach((row) => Object.keys(row).forEach((key) => columns.add(key)));
  return [...columns];
}

/**
 * Render rows as CSV with a header line
 */
export function rowsToCsv(rows: readonly ExportRow[]): string {
  const columns = collectColumns(rows);
  const lines = [
    columns.map(formatCsvValue).join(","),
    ...rows.map((row) => columns.map((col) => formatCsvValue(row[col])).join(",")),
  ];
  return lines.join("\n") + "\n";
}

async function writeExcel(rows: readonly ExportRow[], outputFile: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Results");
  sheet.columns = collectColumns(rows).map((key) => ({ header: key, key }));
  rows.forEach((row) => sheet.addRow(row));
  await workbook.xlsx.writeFile(outputFile);
}

/**
 * Export results to a file. Returns false, after logging, on an unsupported
 * format or a failed write.
 */
export async function exportResults(
  results: unknown,
  outputFile: string,
  formatType: string = "csv"
): Promise<boolean> {
  try {
    if (!isExportFormat(formatType)) {
      throw new Error(`Unsupported format: ${formatType}`);
    }

    switch (formatType) {
      case "csv":
        await writeFile(outputFile, rowsToCsv(toRows(results)), "utf-8");
        break;
      case "json":
        await writeFile(outputFile, JSON.stringify(results, null, 2), "utf-8");
        break;
      case "excel":
        await writeExcel(toRows(results), outputFile);
        break;
    }

    return true;
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(`Error exporting results: ${errorMsg}`);
    return false;
  }
}
