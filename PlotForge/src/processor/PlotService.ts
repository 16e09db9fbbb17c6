import { PNG_MIME_TYPE } from '../interfaces/RenderedImage';
import { TableParser } from '../parser/TableParser';
import { PngEncoder } from '../encoder/PngEncoder';
import { ErrorHelper } from '../utils/ErrorHelper';
import { LogHelper } from '../utils/LogHelper';
import { StringUtils } from '../utils/StringUtils';
import { getRenderSettings, RenderSettings } from '../utils/moduleConfig';
import { PlotDispatcher } from './PlotDispatcher';

export const PLOT_SUCCESS_MESSAGE = 'Plot generated successfully';

export interface PlotResult {
  message: string;
  image: {
    mimeType: typeof PNG_MIME_TYPE;
    /** Base64-encoded PNG. */
    data: string;
  };
  sizeBytes: number;
}

export class PlotService {
  /**
   * Turn CSV text, a plot kind and a serialized options string into a PNG.
   * The kind and options are checked before the CSV is parsed; any failure is logged and rethrown.
   */
  public static GeneratePlot(
    csvData: string,
    plotType: string,
    jsonOptions: string | undefined,
    settings: RenderSettings = getRenderSettings()
  ): PlotResult {
    try {
      const selection = PlotDispatcher.Select(plotType, jsonOptions);
      const table = TableParser.Parse(csvData);
      const request = PlotDispatcher.Attach(selection, table);
      const image = PngEncoder.Encode(PlotDispatcher.BuildFigure(request, settings), settings);

      LogHelper.Info(PLOT_SUCCESS_MESSAGE, {
        plot_type: request.kind,
        options: Object.keys(request.options),
        rows: table.RowCount,
        size: StringUtils.FormatByteSize(image.data.length),
      });

      return {
        message: PLOT_SUCCESS_MESSAGE,
        image: { mimeType: image.mimeType, data: image.data.toString('base64') },
        sizeBytes: image.data.length,
      };
    } catch (err) {
      ErrorHelper.LogError(err, 'Error generating plot');
      throw err;
    }
  }
}
