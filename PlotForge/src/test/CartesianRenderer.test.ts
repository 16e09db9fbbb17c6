import { CartesianRenderer } from '../renderers/CartesianRenderer';
import { TableParser } from '../parser/TableParser';
import { ColumnNotFoundError, InvalidValueError } from '../errors/PlotErrors';
import type { RenderSettings } from '../utils/moduleConfig';

const SETTINGS: RenderSettings = {
  widthInches: 10,
  heightInches: 6,
  dpi: 100,
  backgroundColor: '#ffffff',
  fontFamily: 'sans-serif',
};

describe('CartesianRenderer.BuildPlan - line', () => {
  test('three points connected in row order', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('a,b\n1,2\n2,4\n3,6'), 'line', { x: 'a', y: 'b' });
    expect(plan).toEqual({
      kind: 'line',
      xName: 'a',
      yName: 'b',
      hueName: null,
      xAxis: 'value',
      categories: [],
      series: [{ name: 'b', points: [[1, 2], [2, 4], [3, 6]] }],
    });
  });

  test('does not sort x', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('a,b\n3,1\n1,2\n2,3'), 'line', {});
    expect(plan.series[0]).toEqual({ name: 'b', points: [[3, 1], [1, 2], [2, 3]] });
  });

  test('one series per hue value in first-appearance order', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('x,y,g\n1,10,p\n2,20,q\n3,30,p'), 'line', { hue: 'g' });
    expect(plan.hueName).toBe('g');
    expect(plan.series).toEqual([
      { name: 'p', points: [[1, 10], [3, 30]] },
      { name: 'q', points: [[2, 20]] },
    ]);
  });

  test('text x becomes a category axis', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('name,v,w\nx,1,2\ny,3,4'), 'line', {});
    expect(plan.xName).toBe('name');
    expect(plan.yName).toBe('v');
    expect(plan.xAxis).toBe('category');
    expect(plan.categories).toEqual(['x', 'y']);
    expect(plan.series[0].name).toBe('v');
  });

  test('temporal x uses a time axis in epoch milliseconds', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('d,v\n2024-01-01,1\n2024-01-02,2'), 'line', {});
    expect(plan.xAxis).toBe('time');
    expect(plan.series[0]).toEqual({
      name: 'v',
      points: [
        [new Date(2024, 0, 1).getTime(), 1],
        [new Date(2024, 0, 2).getTime(), 2],
      ],
    });
  });

  test('a single column is plotted against row position', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('v\n5\n7'), 'line', {});
    expect(plan.xName).toBe('index');
    expect(plan.xAxis).toBe('value');
    expect(plan.series[0]).toEqual({ name: 'v', points: [[0, 5], [1, 7]] });
  });

  test('rows with a missing y are skipped', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('a,b\n1,2\n2,NA\n3,6'), 'line', {});
    expect(plan.series[0]).toEqual({ name: 'b', points: [[1, 2], [3, 6]] });
  });
});

describe('CartesianRenderer.ResolveColumns', () => {
  const table = TableParser.Parse('a,b,c\n1,x,2');

  test('y defaults to the first numeric column other than x', () => {
    const { x, y } = CartesianRenderer.ResolveColumns(table, { x: 'a' });
    expect(x?.name).toBe('a');
    expect(y.name).toBe('c');
  });

  test('x defaults to the first column other than y', () => {
    const { x, y } = CartesianRenderer.ResolveColumns(table, { y: 'c' });
    expect(x?.name).toBe('a');
    expect(y.name).toBe('c');
  });

  test('a lone numeric first column becomes y', () => {
    const { x, y } = CartesianRenderer.ResolveColumns(TableParser.Parse('v,label\n1,a\n2,b'), {});
    expect(x?.name).toBe('label');
    expect(y.name).toBe('v');
  });

  test('y must be numeric', () => {
    expect(() => CartesianRenderer.ResolveColumns(table, { y: 'b' })).toThrow(
      new InvalidValueError("Column 'b' must be numeric to be used as y")
    );
  });

  test('fails when no numeric column exists', () => {
    expect(() => CartesianRenderer.ResolveColumns(TableParser.Parse('a,b\nx,y'), {})).toThrow(InvalidValueError);
  });

  test('unknown columns fail by name', () => {
    expect(() => CartesianRenderer.ResolveColumns(table, { hue: 'zz' })).toThrow(ColumnNotFoundError);
  });
});

describe('CartesianRenderer.BuildPlan - bar', () => {
  test('bar height is the mean of rows sharing x, text categories keep first appearance', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('k,v\nb,2\na,5\nb,6'), 'bar', {});
    expect(plan.categories).toEqual(['b', 'a']);
    expect(plan.series).toEqual([{ name: 'v', values: [4, 5] }]);
  });

  test('numeric categories are sorted ascending', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('yr,v\n2022,1\n2020,2\n2021,3'), 'bar', {});
    expect(plan.categories).toEqual(['2020', '2021', '2022']);
    expect(plan.series).toEqual([{ name: 'v', values: [2, 3, 1] }]);
  });

  test('missing hue-by-x combinations have no bar', () => {
    const plan = CartesianRenderer.BuildPlan(TableParser.Parse('k,g,v\na,p,1\nb,q,2'), 'bar', { x: 'k', y: 'v', hue: 'g' });
    expect(plan.categories).toEqual(['a', 'b']);
    expect(plan.series).toEqual([
      { name: 'p', values: [1, null] },
      { name: 'q', values: [null, 2] },
    ]);
  });
});

describe('CartesianRenderer.BuildFigure', () => {
  test('single-row bar chart at the configured size', () => {
    const figure = CartesianRenderer.BuildFigure(TableParser.Parse('a,b\n1,2'), 'bar', {}, SETTINGS);
    expect(figure.width).toBe(1000);
    expect(figure.height).toBe(600);
    expect(figure.mapName).toBeUndefined();
    expect(figure.option.legend).toBeUndefined();
    expect(figure.option.xAxis).toMatchObject({ type: 'category', name: 'a', data: ['1'] });
    expect(figure.option.series).toEqual([{ type: 'bar', name: 'b', data: [2] }]);
  });

  test('line chart with hue shows a legend and a title', () => {
    const figure = CartesianRenderer.BuildFigure(
      TableParser.Parse('x,y,g\n1,10,p\n2,20,q'),
      'line',
      { hue: 'g', title: 'Trend' },
      SETTINGS
    );
    expect(figure.option.title).toMatchObject({ text: 'Trend' });
    expect(figure.option.legend).toMatchObject({ data: ['p', 'q'] });
    expect(figure.option.xAxis).toMatchObject({ type: 'value', name: 'x' });
  });
});
