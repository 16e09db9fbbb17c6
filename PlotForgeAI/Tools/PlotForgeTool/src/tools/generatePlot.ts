import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ErrorHelper, NO_OPTIONS_SENTINEL, PlotService } from 'plotforge';

export const GENERATE_PLOT_TOOL_NAME = 'generate_plot';

const DESCRIPTION = [
  'Generate a plot from CSV data and return it as a PNG image.',
  'plot_type is one of: line, bar, pie, worldmap (default: line).',
  'json_kwargs is a JSON object string with plot options, or "None" for defaults.',
  'Line/bar options: x (x-axis column), y (y-axis column), hue (column that splits rows into one series per value), title.',
  'Pie options: labels (label column), values (numeric column), title. Values must be positive.',
  'Worldmap: latitude column named lat, latitude or y; longitude column named lon, lng, long, longitude or x.',
  'Worldmap options: s (marker size, default 50), c (marker color: CSS color name, hex code, rgb() value or one of b, g, r, c, m, y, k, w; default "red"), alpha (opacity between 0 and 1, default 0.7), marker (marker style, default "o"), title.',
].join(' ');

export interface GeneratePlotArgs {
  csv_data: string;
  plot_type: string;
  json_kwargs: string;
}

export function generatePlot(args: GeneratePlotArgs): CallToolResult {
  try {
    const result = PlotService.GeneratePlot(args.csv_data, args.plot_type, args.json_kwargs);
    return {
      content: [
        { type: 'text', text: result.message },
        { type: 'image', mimeType: result.image.mimeType, data: result.image.data },
      ],
    };
  } catch (error) {
    return {
      content: [
        {
          type: 'text',
          text: `Error generating plot: ${ErrorHelper.Describe(error)}`,
        },
      ],
      isError: true,
    };
  }
}

export function registerGeneratePlotTool(server: McpServer) {
  server.registerTool(GENERATE_PLOT_TOOL_NAME, {
    description: DESCRIPTION,
    inputSchema: {
      csv_data: z.string()
        .describe('CSV data as a string; the first line is the header row'),

      plot_type: z.string()
        .default('line')
        .describe('Type of plot to generate: line, bar, pie or worldmap'),

      json_kwargs: z.string()
        .default(NO_OPTIONS_SENTINEL)
        .describe('JSON object string with additional plot options, or "None" for defaults'),
    },
  }, async ({ csv_data, plot_type, json_kwargs }) => generatePlot({ csv_data, plot_type, json_kwargs }));
}
