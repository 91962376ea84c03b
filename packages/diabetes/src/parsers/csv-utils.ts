/**
 * CSV parsing utilities
 */

/**
 * Parse a CSV line, handling quoted values
 */
export function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      // Doubled quote inside a quoted field is a literal quote
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === "," && !inQuotes) {
      values.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  values.push(current.trim());
  return values;
}

/**
 * Split content into non-blank lines, tolerating CRLF endings
 */
export function splitLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== "");
}

/**
 * Normalize a column name for lookup: lowercase alphanumerics only
 */
export function normalizeColumnName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Create column index map from header
 */
export function createColumnMap(header: string[]): Map<string, number> {
  const map = new Map<string, number>();
  header.forEach((col, idx) => {
    map.set(normalizeColumnName(col), idx);
  });
  return map;
}

/**
 * Whether any of the given column names is present
 */
export function hasColumn(colMap: Map<string, number>, ...names: string[]): boolean {
  return names.some((name) => colMap.has(normalizeColumnName(name)));
}

/**
 * Get column value by possible names
 */
export function getColumn(row: string[], colMap: Map<string, number>, ...names: string[]): string {
  for (const name of names) {
    const idx = colMap.get(normalizeColumnName(name));
    if (idx !== undefined && row[idx] !== undefined) {
      return row[idx];
    }
  }
  return "";
}

/**
 * Quote a value for CSV output when it contains a delimiter, quote or newline
 */
export function formatCsvValue(value: string | number | boolean | null | undefined): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
