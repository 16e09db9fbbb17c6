import { PLOT_KINDS, PlotKind, PlotRequest, PlotSelection, isPlotKind } from '../interfaces/PlotRequest';
import { Table } from '../interfaces/Table';
import { UnsupportedPlotKindError } from '../errors/PlotErrors';
import { ChartFigure } from '../renderers/ChartFigure';
import { CartesianRenderer } from '../renderers/CartesianRenderer';
import { PieRenderer } from '../renderers/PieRenderer';
import { WorldMapRenderer } from '../renderers/WorldMapRenderer';
import { PngEncoder } from '../encoder/PngEncoder';
import { getRenderSettings, RenderSettings } from '../utils/moduleConfig';
import { OptionsDecoder } from './OptionsDecoder';

/** Raw options as they arrive from a caller: serialized JSON, the "None" sentinel, or an already-decoded object. */
export type RawOptions = string | Record<string, unknown> | null | undefined;

export class PlotDispatcher {
  /** Case-sensitive; there is no fallback kind. */
  public static CheckKind(kind: string): PlotKind {
    if (!isPlotKind(kind)) {
      throw new UnsupportedPlotKindError(kind, PLOT_KINDS);
    }
    return kind;
  }

  /**
   * Check the kind, then decode and validate the options for it.
   * Runs before any table is touched, so option errors surface ahead of data errors.
   */
  public static Select(kind: string, rawOptions: RawOptions): PlotSelection {
    const checked = PlotDispatcher.CheckKind(kind);
    const bag = typeof rawOptions === 'object' && rawOptions !== null ? rawOptions : OptionsDecoder.Decode(rawOptions);

    switch (checked) {
      case 'line':
      case 'bar':
        return { kind: checked, options: Object.freeze(OptionsDecoder.Cartesian(bag, checked)) };
      case 'pie':
        return { kind: checked, options: Object.freeze(OptionsDecoder.Pie(bag)) };
      case 'worldmap':
        return { kind: checked, options: Object.freeze(OptionsDecoder.WorldMap(bag)) };
    }
  }

  public static BuildRequest(table: Table, kind: string, rawOptions: RawOptions): PlotRequest {
    return PlotDispatcher.Attach(PlotDispatcher.Select(kind, rawOptions), table);
  }

  public static Attach(selection: PlotSelection, table: Table): PlotRequest {
    return Object.freeze({ ...selection, table });
  }

  public static BuildFigure(request: PlotRequest, settings: RenderSettings = getRenderSettings()): ChartFigure {
    switch (request.kind) {
      case 'line':
      case 'bar':
        return CartesianRenderer.BuildFigure(request.table, request.kind, request.options, settings);
      case 'pie':
        return PieRenderer.BuildFigure(request.table, request.options, settings);
      case 'worldmap':
        return WorldMapRenderer.BuildFigure(request.table, request.options, settings);
      default: {
        const unreachable: never = request;
        throw new UnsupportedPlotKindError(String(unreachable), PLOT_KINDS);
      }
    }
  }

  /** `render(table, kind, options) -> PNG bytes`. */
  public static Render(table: Table, kind: string, rawOptions: RawOptions, settings: RenderSettings = getRenderSettings()): Buffer {
    const request = PlotDispatcher.BuildRequest(table, kind, rawOptions);
    return PngEncoder.Encode(PlotDispatcher.BuildFigure(request, settings), settings).data;
  }
}
