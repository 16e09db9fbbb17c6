import { DateUtils } from '../utils/DateUtils';

describe('DateUtils.ParseDateCell', () => {
  const march15 = new Date(2024, 2, 15);

  test('parses ISO dates as local midnight', () => {
    expect(DateUtils.ParseDateCell('2024-03-15')).toEqual(march15);
  });

  test('parses ISO date-times with an offset', () => {
    expect(DateUtils.ParseDateCell('2024-03-15T10:30:00Z')?.getTime()).toBe(Date.UTC(2024, 2, 15, 10, 30));
  });

  test('parses common spreadsheet layouts', () => {
    expect(DateUtils.ParseDateCell('03/15/2024')).toEqual(march15);
    expect(DateUtils.ParseDateCell('2024/03/15')).toEqual(march15);
    expect(DateUtils.ParseDateCell('15.03.2024')).toEqual(march15);
    expect(DateUtils.ParseDateCell('Mar 15, 2024')).toEqual(march15);
    expect(DateUtils.ParseDateCell('15 Mar 2024')).toEqual(march15);
    expect(DateUtils.ParseDateCell('2024/03/15 08:45')).toEqual(new Date(2024, 2, 15, 8, 45));
  });

  test('returns null for non-dates', () => {
    expect(DateUtils.ParseDateCell('hello')).toBeNull();
    expect(DateUtils.ParseDateCell('42')).toBeNull();
    expect(DateUtils.ParseDateCell('2024-13-45')).toBeNull();
  });
});

describe('DateUtils.FormatLabel', () => {
  test('omits the time at midnight', () => {
    expect(DateUtils.FormatLabel(new Date(2024, 2, 15))).toBe('2024-03-15');
  });

  test('includes minutes, and seconds when present', () => {
    expect(DateUtils.FormatLabel(new Date(2024, 2, 15, 9, 5))).toBe('2024-03-15 09:05');
    expect(DateUtils.FormatLabel(new Date(2024, 2, 15, 9, 5, 7))).toBe('2024-03-15 09:05:07');
  });
});
