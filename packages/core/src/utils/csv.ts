// Tabular rendering for context sections
export type CsvCell = string | number;

/**
 * Render rows as `,\t`-separated lines
 */
export function listOfListToCsv(rows: readonly (readonly CsvCell[])[]): string {
  return rows.map((row) => row.map(String).join(',\t')).join('\n');
}
