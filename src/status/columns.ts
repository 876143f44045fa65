export type ColumnValues = Map<string, string>;

/**
 * Maps row values onto header names by position. Values past the end of the
 * header are dropped; header names past the end of the row stay absent.
 * Every name in `defaults` starts out as an empty string so label columns
 * missing from this particular header still produce a label.
 */
export function projectColumns(
  header: readonly string[],
  values: readonly string[],
  defaults: readonly string[] = []
): ColumnValues {
  const columns: ColumnValues = new Map();
  for (const column of defaults) {
    columns.set(column, '');
  }

  const count = Math.min(header.length, values.length);
  for (let index = 0; index < count; index += 1) {
    columns.set(header[index], values[index]);
  }
  return columns;
}

export function buildLabelTuple(
  source: string,
  columns: ColumnValues,
  labelColumns: readonly string[]
): string[] {
  return [source, ...labelColumns.map(column => columns.get(column) ?? '')];
}
