import type { EChartsOption } from 'echarts';
import { PieOptions } from '../interfaces/PlotRequest';
import { Column, NumericColumn, Table } from '../interfaces/Table';
import { AmbiguousShapeError, InvalidValueError } from '../errors/PlotErrors';
import type { RenderSettings } from '../utils/moduleConfig';
import { ChartFigure, baseOption, figureSize } from './ChartFigure';
import { CartesianRenderer } from './CartesianRenderer';
import { ColumnResolver } from './ColumnResolver';

export interface PieSlice {
  label: string;
  value: number;
}

export class PieRenderer {
  /**
   * Labels come from the first text column (or first temporal column when there is no text),
   * values from the first numeric column, unless `labels` / `values` name them explicitly.
   */
  public static ResolveColumns(table: Table, options: Readonly<PieOptions>): { labels: Column; values: NumericColumn } {
    const values = options.values !== undefined
      ? ColumnResolver.Require(table, options.values, 'values')
      : table.FirstColumnOfType('numeric');
    const valuesName = values?.name;
    const exclude = valuesName !== undefined ? [valuesName] : [];
    const labels = options.labels !== undefined
      ? ColumnResolver.Require(table, options.labels, 'labels')
      : table.FirstColumnOfType('text', exclude) ?? table.FirstColumnOfType('temporal', exclude);

    if (values === null || labels === null) {
      const missing = [labels === null ? 'label (text)' : null, values === null ? 'value (numeric)' : null].filter(
        (m): m is string => m !== null
      );
      throw new AmbiguousShapeError(
        `Pie charts need one label column and one numeric value column; no ${missing.join(' or ')} column found`,
        { columns: table.ColumnNames }
      );
    }
    if (values.type !== 'numeric') {
      throw new InvalidValueError(`Column '${values.name}' must be numeric to size pie slices`, {
        column: values.name,
        option: 'values',
      });
    }
    return { labels, values };
  }

  /** One slice per row, in row order. Every value must be present and strictly positive. */
  public static BuildSlices(table: Table, options: Readonly<PieOptions>): PieSlice[] {
    const { labels, values } = PieRenderer.ResolveColumns(table, options);
    if (table.RowCount === 0) {
      throw new InvalidValueError('Pie charts need at least one row', { column: values.name });
    }

    const slices: PieSlice[] = [];
    for (let i = 0; i < table.RowCount; i++) {
      const value = values.values[i];
      if (value === null) {
        throw new InvalidValueError(`Column '${values.name}' has a missing value at row ${i + 1}`, {
          column: values.name,
          row: i + 1,
        });
      }
      if (value <= 0) {
        throw new InvalidValueError(
          `Pie slices cannot be zero or negative: column '${values.name}' row ${i + 1}`,
          { column: values.name, row: i + 1 }
        );
      }
      slices.push({ label: CartesianRenderer.Label(labels.values[i]), value });
    }
    return slices;
  }

  public static BuildFigure(table: Table, options: Readonly<PieOptions>, settings: RenderSettings): ChartFigure {
    const slices = PieRenderer.BuildSlices(table, options);
    const option: EChartsOption = {
      ...baseOption(settings, options.title),
      legend: { orient: 'vertical', left: 10, top: 'middle' },
      series: [
        {
          type: 'pie',
          radius: '65%',
          center: ['55%', '55%'],
          data: slices.map(s => ({ name: s.label, value: s.value })),
          label: { formatter: '{b}: {d}%' },
        },
      ],
    };
    return { option, ...figureSize(settings) };
  }
}
