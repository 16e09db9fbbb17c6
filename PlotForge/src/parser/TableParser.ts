import { parse as parseCsv } from 'csv-parse/sync';
import { Column, Table } from '../interfaces/Table';
import { MalformedInputError } from '../errors/PlotErrors';
import { isMissing, parseNumber } from '../utils/ValueUtils';
import { DateUtils } from '../utils/DateUtils';

export class TableParser {
  /**
   * Parse CSV text (comma-delimited, header row first, RFC 4180 quoting) into a typed Table.
   *
   * Row-length policy: short rows are padded with missing values; rows with more
   * fields than the header are rejected. Empty header cells are named `Unnamed: <index>`.
   */
  public static Parse(csvText: string): Table {
    if (csvText.trim().length === 0) {
      throw new MalformedInputError('CSV input is empty');
    }

    const rows = TableParser.tokenize(csvText);
    if (rows.length === 0) {
      throw new MalformedInputError('CSV input has no header row');
    }

    const header = TableParser.readHeader(rows[0]);
    const dataRows = rows.slice(1);

    const cells: Array<Array<string | null>> = header.map(() => []);
    dataRows.forEach((row, i) => {
      if (row.length > header.length) {
        throw new MalformedInputError(
          `Row ${i + 1} has ${row.length} fields, expected at most ${header.length}`,
          { row: i + 1, fields: row.length, expected: header.length }
        );
      }
      for (let c = 0; c < header.length; c++) {
        const raw = c < row.length ? row[c] : null;
        cells[c].push(isMissing(raw) ? null : raw);
      }
    });

    return new Table(header.map((name, c) => TableParser.inferColumn(name, cells[c])));
  }

  private static tokenize(csvText: string): string[][] {
    let parsed: unknown;
    try {
      parsed = parseCsv(csvText, {
        bom: true,
        delimiter: ',',
        relax_column_count: true,
        skip_empty_lines: true,
      });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new MalformedInputError(`Unable to parse CSV: ${detail}`);
    }

    if (!Array.isArray(parsed)) {
      throw new MalformedInputError('Unable to parse CSV: unexpected parser output');
    }

    const rows: string[][] = [];
    for (const record of parsed) {
      if (!Array.isArray(record) || !record.every((cell): cell is string => typeof cell === 'string')) {
        throw new MalformedInputError('Unable to parse CSV: unexpected parser output');
      }
      // Whitespace-only lines
      if (record.length === 1 && record[0].trim().length === 0) continue;
      rows.push(record);
    }
    return rows;
  }

  private static readHeader(row: string[]): string[] {
    const names = row.map((name, i) => (name.trim().length === 0 ? `Unnamed: ${i}` : name));
    const seen = new Set<string>();
    for (const name of names) {
      if (seen.has(name)) {
        throw new MalformedInputError(`Duplicate column name '${name}' in header`, { column: name });
      }
      seen.add(name);
    }
    return names;
  }

  /** Numeric, then temporal, then text. Missing cells never decide the type. */
  private static inferColumn(name: string, raw: Array<string | null>): Column {
    const present = raw.filter((v): v is string => v !== null);
    if (present.length === 0) {
      return { name, type: 'text', values: raw.map(() => null) };
    }

    const numbers = raw.map(v => (v === null ? null : parseNumber(v)));
    if (numbers.every((n, i) => raw[i] === null || n !== null)) {
      return { name, type: 'numeric', values: numbers };
    }

    const dates = raw.map(v => (v === null ? null : DateUtils.ParseDateCell(v)));
    if (dates.every((d, i) => raw[i] === null || d !== null)) {
      return { name, type: 'temporal', values: dates };
    }

    return { name, type: 'text', values: raw };
  }
}
