import { format, isValid, parse, parseISO } from 'date-fns';

const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

// Tried in order after ISO 8601. The first format that consumes the whole cell wins.
const DATE_FORMATS = [
  'yyyy/MM/dd',
  'yyyy/MM/dd HH:mm',
  'yyyy/MM/dd HH:mm:ss',
  'MM/dd/yyyy',
  'MM/dd/yyyy HH:mm',
  'MM/dd/yyyy HH:mm:ss',
  'dd.MM.yyyy',
  'MMM d, yyyy',
  'd MMM yyyy',
];

const REFERENCE_DATE = new Date(2000, 0, 1);

export class DateUtils {
  /**
   * Parse a raw CSV cell as a date/time, or return null.
   * ISO 8601 strings (date-only or with time, optional offset) are tried first, then
   * a short list of common spreadsheet layouts. Values without an offset are local time.
   */
  public static ParseDateCell(raw: string): Date | null {
    const trimmed = raw.trim();
    if (trimmed.length === 0) return null;

    if (ISO_PATTERN.test(trimmed)) {
      const d = parseISO(trimmed);
      return isValid(d) ? d : null;
    }

    for (const fmt of DATE_FORMATS) {
      const d = parse(trimmed, fmt, REFERENCE_DATE);
      if (isValid(d)) return d;
    }
    return null;
  }

  /**
   * Short label for a date on a categorical axis or legend:
   * `yyyy-MM-dd` at local midnight, otherwise with the time of day.
   */
  public static FormatLabel(value: Date): string {
    if (value.getHours() === 0 && value.getMinutes() === 0 && value.getSeconds() === 0 && value.getMilliseconds() === 0) {
      return format(value, 'yyyy-MM-dd');
    }
    if (value.getSeconds() === 0 && value.getMilliseconds() === 0) {
      return format(value, 'yyyy-MM-dd HH:mm');
    }
    return format(value, 'yyyy-MM-dd HH:mm:ss');
  }
}
