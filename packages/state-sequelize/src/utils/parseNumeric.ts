/**
 * Read a numeric column that may arrive as a string.
 *
 * PostgreSQL returns BIGINT and some DOUBLE/DECIMAL columns as strings to
 * avoid precision loss; SQLite and MySQL return numbers.
 */
export function parseNumeric(value: number | string, column: string): number {
  if (typeof value === 'number') return value;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new Error(`Column '${column}' holds a non-numeric value '${value}'`);
  }
  return n;
}
