import { generatePlot } from '../tools/generatePlot.js';

const PNG_SIGNATURE_HEX = '89504e470d0a1a0a';

describe('generate_plot tool', () => {
  test('returns a status message and a base64 PNG on success', () => {
    const result = generatePlot({ csv_data: 'a,b\n1,2\n2,4\n3,6', plot_type: 'line', json_kwargs: '{"x":"a","y":"b"}' });

    expect(result.isError).toBeUndefined();
    expect(result.content).toHaveLength(2);
    expect(result.content[0]).toEqual({ type: 'text', text: 'Plot generated successfully' });

    const image = result.content[1];
    expect(image.type).toBe('image');
    if (image.type !== 'image') return;
    expect(image.mimeType).toBe('image/png');
    const png = Buffer.from(image.data, 'base64');
    expect(png.subarray(0, 8).toString('hex')).toBe(PNG_SIGNATURE_HEX);
  });

  test('accepts the None sentinel for options', () => {
    const result = generatePlot({ csv_data: 'fruit,count\napple,3\npear,5', plot_type: 'pie', json_kwargs: 'None' });
    expect(result.isError).toBeUndefined();
    expect(result.content[0]).toEqual({ type: 'text', text: 'Plot generated successfully' });
  });

  test('reports an unsupported plot type as a tool error', () => {
    const result = generatePlot({ csv_data: 'a,b\n1,2', plot_type: 'scatter', json_kwargs: 'None' });
    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: 'text',
        text: "Error generating plot: Unsupported plot type 'scatter'. Supported types: line, bar, pie, worldmap",
      },
    ]);
  });

  test('reports invalid JSON options as a tool error', () => {
    const result = generatePlot({ csv_data: 'a,b\n1,2', plot_type: 'line', json_kwargs: '{x:' });
    expect(result.isError).toBe(true);
    const first = result.content[0];
    expect(first.type).toBe('text');
    if (first.type !== 'text') return;
    expect(first.text.startsWith('Error generating plot: Options are not valid JSON: ')).toBe(true);
  });

  test('reports a missing column by name', () => {
    const result = generatePlot({ csv_data: 'a,b\n1,2', plot_type: 'bar', json_kwargs: '{"x":"missing"}' });
    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: 'text',
        text: "Error generating plot: Column 'missing' (option 'x') not found. Available columns: a, b",
      },
    ]);
  });
});
