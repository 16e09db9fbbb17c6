export type ColumnType = 'numeric' | 'text' | 'temporal';

export type NumericColumn = { readonly name: string; readonly type: 'numeric'; readonly values: ReadonlyArray<number | null> };
export type TextColumn = { readonly name: string; readonly type: 'text'; readonly values: ReadonlyArray<string | null> };
export type TemporalColumn = { readonly name: string; readonly type: 'temporal'; readonly values: ReadonlyArray<Date | null> };

export type Column = NumericColumn | TextColumn | TemporalColumn;

export type CellValue = number | string | Date | null;

/**
 * Column-oriented, typed view of a CSV document.
 *
 * Tables are frozen on construction: column arrays cannot be pushed to and
 * the column list cannot be reordered, so renderers can share one safely.
 */
export class Table {
  public readonly Columns: ReadonlyArray<Column>;
  public readonly RowCount: number;

  constructor(columns: Column[]) {
    const rowCount = columns.length > 0 ? columns[0].values.length : 0;
    const seen = new Set<string>();
    for (const column of columns) {
      if (column.values.length !== rowCount) {
        throw new Error(`Column '${column.name}' has ${column.values.length} values, expected ${rowCount}`);
      }
      if (seen.has(column.name)) {
        throw new Error(`Duplicate column '${column.name}'`);
      }
      seen.add(column.name);
    }

    this.Columns = Object.freeze(columns.map(c => Table.freezeColumn(c)));
    this.RowCount = rowCount;
    Object.freeze(this);
  }

  public get ColumnNames(): string[] {
    return this.Columns.map(c => c.name);
  }

  /** Exact, case-sensitive lookup. */
  public GetColumn(name: string): Column | null {
    return this.Columns.find(c => c.name === name) ?? null;
  }

  public FirstColumnOfType(type: ColumnType, exclude: ReadonlyArray<string> = []): Column | null {
    return this.Columns.find(c => c.type === type && !exclude.includes(c.name)) ?? null;
  }

  public GetCell(columnName: string, rowIndex: number): CellValue {
    const column = this.GetColumn(columnName);
    if (!column || rowIndex < 0 || rowIndex >= this.RowCount) return null;
    return column.values[rowIndex];
  }

  private static freezeColumn(column: Column): Column {
    switch (column.type) {
      case 'numeric':
        return Object.freeze({ name: column.name, type: column.type, values: Object.freeze([...column.values]) });
      case 'text':
        return Object.freeze({ name: column.name, type: column.type, values: Object.freeze([...column.values]) });
      case 'temporal':
        return Object.freeze({ name: column.name, type: column.type, values: Object.freeze([...column.values]) });
    }
  }
}
