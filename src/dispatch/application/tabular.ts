/**
 * Tabular helpers.
 *
 * Timing endpoints return one JSON object per row (lap, telemetry
 * sample). Rows are presented column-wise: one ordered array per field,
 * which is both smaller and easier for the assistant to scan.
 */

export type ColumnTable = Record<string, unknown[]>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Replace values that have no JSON meaning (NaN, ±Infinity, undefined)
 * with null. Other values pass through untouched.
 */
export function toCell(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return null;
  }
  return value;
}

/**
 * Convert an array of row records to a column table.
 *
 * Columns appear in first-seen order across all rows; a row lacking a
 * column contributes null at its index, so every column has rows.length
 * entries. Returns null when the input is not an array of records.
 */
export function rowsToColumns(rows: unknown): ColumnTable | null {
  if (!Array.isArray(rows) || !rows.every(isRecord)) {
    return null;
  }

  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) {
        columns.push(key);
      }
    }
  }

  const table: ColumnTable = {};
  for (const column of columns) {
    table[column] = rows.map((row) => toCell(row[column]));
  }

  return table;
}
