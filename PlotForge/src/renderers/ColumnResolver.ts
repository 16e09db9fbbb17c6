import { Column, Table } from '../interfaces/Table';
import { ColumnNotFoundError } from '../errors/PlotErrors';

export const LATITUDE_ALIASES: readonly string[] = ['lat', 'latitude', 'y'];
export const LONGITUDE_ALIASES: readonly string[] = ['lon', 'lng', 'long', 'longitude', 'x'];

export class ColumnResolver {
  /**
   * Find the column matching the earliest alias in `aliases`, comparing names case-insensitively.
   * Alias order decides the winner, not column order: with columns `y, lat` and aliases
   * `lat, latitude, y` the result is `lat`.
   */
  public static ResolveAlias(columnNames: ReadonlyArray<string>, aliases: ReadonlyArray<string>): string | null {
    for (const alias of aliases) {
      const wanted = alias.toLowerCase();
      const match = columnNames.find(name => name.trim().toLowerCase() === wanted);
      if (match !== undefined) return match;
    }
    return null;
  }

  /** Exact-name lookup that fails with ColumnNotFoundError naming the option that asked for it. */
  public static Require(table: Table, name: string, option: string): Column {
    const column = table.GetColumn(name);
    if (!column) {
      throw new ColumnNotFoundError(name, option, table.ColumnNames);
    }
    return column;
  }
}
