import type { EChartsOption, XAXisComponentOption } from 'echarts';
import { CartesianOptions } from '../interfaces/PlotRequest';
import { Column, NumericColumn, Table } from '../interfaces/Table';
import { InvalidValueError } from '../errors/PlotErrors';
import { DateUtils } from '../utils/DateUtils';
import { mean } from '../utils/ValueUtils';
import type { RenderSettings } from '../utils/moduleConfig';
import { ChartFigure, baseOption, figureSize, topOffset } from './ChartFigure';
import { ColumnResolver } from './ColumnResolver';

export type CartesianKind = 'line' | 'bar';
export type XAxisKind = 'value' | 'time' | 'category';

export const INDEX_AXIS_NAME = 'index';

export interface LineSeries {
  name: string;
  /** [x, y] pairs in raw row order; x is a number, epoch millis or a category label. */
  points: Array<[number | string, number]>;
}

export interface BarSeries {
  name: string;
  /** One entry per category; null where the series has no rows for that category. */
  values: Array<number | null>;
}

export type CartesianPlan =
  | { kind: 'line'; xName: string; yName: string; hueName: string | null; xAxis: XAxisKind; categories: string[]; series: LineSeries[] }
  | { kind: 'bar'; xName: string; yName: string; hueName: string | null; xAxis: 'category'; categories: string[]; series: BarSeries[] };

interface ResolvedColumns {
  x: Column | null; // null = row position
  y: NumericColumn;
  hue: Column | null;
}

export class CartesianRenderer {
  /**
   * Pick the x, y and hue columns.
   *
   * Defaults when omitted:
   * - only `x` given: `y` is the first numeric column other than `x`
   * - only `y` given: `x` is the first column other than `y`, or the row position for a one-column table
   * - neither: `x` is the first column and `y` the first numeric column after it; if no other
   *   column is numeric, `y` is the first numeric column and `x` the first column other than it
   */
  public static ResolveColumns(table: Table, options: Readonly<CartesianOptions>): ResolvedColumns {
    const hue = options.hue !== undefined ? ColumnResolver.Require(table, options.hue, 'hue') : null;
    let x = options.x !== undefined ? ColumnResolver.Require(table, options.x, 'x') : null;
    let y = options.y !== undefined ? ColumnResolver.Require(table, options.y, 'y') : null;

    if (x === null && y === null) {
      if (table.Columns.length === 1) {
        y = table.Columns[0];
      } else if (table.Columns.length > 1) {
        x = table.Columns[0];
        y = table.FirstColumnOfType('numeric', [x.name]);
        if (y === null) {
          y = table.FirstColumnOfType('numeric');
          const yName = y?.name;
          x = table.Columns.find(c => c.name !== yName) ?? null;
        }
      }
    } else if (y === null && x !== null) {
      y = table.FirstColumnOfType('numeric', [x.name]);
    } else if (x === null && y !== null) {
      const yName = y.name;
      x = table.Columns.find(c => c.name !== yName) ?? null;
    }

    if (y === null) {
      throw new InvalidValueError('No numeric column available for the y axis; pass "y" explicitly', {
        option: 'y',
      });
    }
    if (y.type !== 'numeric') {
      throw new InvalidValueError(`Column '${y.name}' must be numeric to be used as y`, { column: y.name, option: 'y' });
    }
    return { x, y, hue };
  }

  public static BuildPlan(table: Table, kind: CartesianKind, options: Readonly<CartesianOptions>): CartesianPlan {
    const { x, y, hue } = CartesianRenderer.ResolveColumns(table, options);
    const xName = x ? x.name : INDEX_AXIS_NAME;
    const hueName = hue ? hue.name : null;

    // Rows with a missing x, y or hue are dropped.
    const rows: Array<{ x: number | string | Date; y: number; group: string }> = [];
    for (let i = 0; i < table.RowCount; i++) {
      const xv = x ? x.values[i] : i;
      const yv = y.values[i];
      const hv = hue ? hue.values[i] : null;
      if (xv === null || yv === null || (hue !== null && hv === null)) continue;
      rows.push({ x: xv, y: yv, group: hue ? CartesianRenderer.Label(hv) : y.name });
    }

    const groups = CartesianRenderer.distinct(rows.map(r => r.group));

    if (kind === 'line') {
      const xAxis: XAxisKind = x === null || x.type === 'numeric' ? 'value' : x.type === 'temporal' ? 'time' : 'category';
      const categories = xAxis === 'category' ? CartesianRenderer.distinct(rows.map(r => CartesianRenderer.Label(r.x))) : [];
      const series: LineSeries[] = groups.map(name => ({
        name,
        points: rows
          .filter(r => r.group === name)
          .map((r): [number | string, number] => [CartesianRenderer.axisValue(r.x, xAxis), r.y]),
      }));
      return { kind, xName, yName: y.name, hueName, xAxis, categories, series };
    }

    const categories = CartesianRenderer.orderCategories(rows.map(r => r.x));
    const series: BarSeries[] = groups.map(name => {
      const inGroup = rows.filter(r => r.group === name);
      return {
        name,
        values: categories.map(cat => mean(inGroup.filter(r => CartesianRenderer.Label(r.x) === cat).map(r => r.y))),
      };
    });
    return { kind, xName, yName: y.name, hueName, xAxis: 'category', categories, series };
  }

  public static BuildFigure(
    table: Table,
    kind: CartesianKind,
    options: Readonly<CartesianOptions>,
    settings: RenderSettings
  ): ChartFigure {
    const plan = CartesianRenderer.BuildPlan(table, kind, options);
    const hasLegend = plan.hueName !== null;

    const option: EChartsOption = {
      ...baseOption(settings, options.title),
      legend: hasLegend ? { top: options.title ? 40 : 8, data: plan.series.map(s => s.name) } : undefined,
      grid: { left: 80, right: 40, top: topOffset(!!options.title, hasLegend), bottom: 70 },
      xAxis: CartesianRenderer.xAxisOption(plan),
      yAxis: { type: 'value', name: plan.yName, nameLocation: 'middle', nameGap: 55, scale: plan.kind === 'line' },
      series:
        plan.kind === 'line'
          ? plan.series.map(s => ({
              type: 'line' as const,
              name: s.name,
              data: s.points,
              showSymbol: true,
              symbol: 'circle',
              symbolSize: 6,
            }))
          : plan.series.map(s => ({
              type: 'bar' as const,
              name: s.name,
              data: s.values.map(v => (v === null ? '-' : v)),
            })),
    };

    return { option, ...figureSize(settings) };
  }

  /** Display label for a cell used as a category, legend entry or hue group. */
  public static Label(value: number | string | Date | null): string {
    if (value === null) return '';
    if (value instanceof Date) return DateUtils.FormatLabel(value);
    return String(value);
  }

  private static xAxisOption(plan: CartesianPlan): XAXisComponentOption {
    const common = { name: plan.xName, nameLocation: 'middle' as const, nameGap: 35 };
    switch (plan.xAxis) {
      case 'value':
        return { ...common, type: 'value', scale: true };
      case 'time':
        return { ...common, type: 'time' };
      case 'category':
        return { ...common, type: 'category', data: plan.categories, boundaryGap: plan.kind === 'bar' };
    }
  }

  private static axisValue(value: number | string | Date, axis: XAxisKind): number | string {
    if (axis === 'category') return CartesianRenderer.Label(value);
    if (value instanceof Date) return value.getTime();
    return value;
  }

  /** Numbers and dates ascending, text in first-appearance order. */
  private static orderCategories(values: Array<number | string | Date>): string[] {
    const allNumbers = values.every(v => typeof v === 'number');
    const allDates = values.every(v => v instanceof Date);
    const sorted = [...values];
    if (allNumbers || allDates) {
      sorted.sort((a, b) => CartesianRenderer.sortKey(a) - CartesianRenderer.sortKey(b));
    }
    return CartesianRenderer.distinct(sorted.map(v => CartesianRenderer.Label(v)));
  }

  private static sortKey(value: number | string | Date): number {
    if (typeof value === 'number') return value;
    if (value instanceof Date) return value.getTime();
    return 0;
  }

  private static distinct(values: string[]): string[] {
    return [...new Set(values)];
  }
}
