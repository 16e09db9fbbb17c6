import type { EChartsOption } from 'echarts';
import { WorldMapOptions } from '../interfaces/PlotRequest';
import { Table } from '../interfaces/Table';
import { MissingCoordinateColumnsError } from '../errors/PlotErrors';
import { toFiniteNumber } from '../utils/ValueUtils';
import { LogHelper } from '../utils/LogHelper';
import type { RenderSettings } from '../utils/moduleConfig';
import { ChartFigure, baseOption, figureSize } from './ChartFigure';
import { ColumnResolver, LATITUDE_ALIASES, LONGITUDE_ALIASES } from './ColumnResolver';
import { WORLD_MAP_NAME } from './WorldOutline';
import { CssColors } from './CssColors';

export const DEFAULT_WORLD_MAP_OPTIONS: Readonly<WorldMapOptions> = Object.freeze({
  s: 50,
  c: 'red',
  alpha: 0.7,
  marker: 'o',
});

/** Glyph shorthands mapped to ECharts symbols; ECharts symbol names are accepted as-is. */
const MARKER_SYMBOLS: Readonly<Record<string, { symbol: string; rotate: number }>> = {
  'o': { symbol: 'circle', rotate: 0 },
  '.': { symbol: 'circle', rotate: 0 },
  's': { symbol: 'rect', rotate: 0 },
  '^': { symbol: 'triangle', rotate: 0 },
  'v': { symbol: 'triangle', rotate: 180 },
  'D': { symbol: 'diamond', rotate: 0 },
  'd': { symbol: 'diamond', rotate: 0 },
  'circle': { symbol: 'circle', rotate: 0 },
  'rect': { symbol: 'rect', rotate: 0 },
  'roundRect': { symbol: 'roundRect', rotate: 0 },
  'triangle': { symbol: 'triangle', rotate: 0 },
  'diamond': { symbol: 'diamond', rotate: 0 },
  'pin': { symbol: 'pin', rotate: 0 },
  'arrow': { symbol: 'arrow', rotate: 0 },
};

const COLOR_SHORTHANDS: Readonly<Record<string, string>> = {
  b: 'blue',
  g: 'green',
  r: 'red',
  c: 'cyan',
  m: 'magenta',
  y: 'yellow',
  k: 'black',
  w: 'white',
};

export const MARKER_NAMES: readonly string[] = Object.keys(MARKER_SYMBOLS);

export function isKnownMarker(marker: string): boolean {
  return Object.prototype.hasOwnProperty.call(MARKER_SYMBOLS, marker);
}

export const COLOR_SHORTHAND_NAMES: readonly string[] = Object.keys(COLOR_SHORTHANDS);

export function isKnownColor(c: string): boolean {
  return Object.prototype.hasOwnProperty.call(COLOR_SHORTHANDS, c) || CssColors.IsValid(c);
}

export interface WorldMapPlan {
  latitudeColumn: string;
  longitudeColumn: string;
  /** [longitude, latitude] in degrees, row order. */
  points: Array<[number, number]>;
  skippedRows: number;
}

export class WorldMapRenderer {
  public static ResolveCoordinateColumns(table: Table): { latitude: string; longitude: string } {
    const latitude = ColumnResolver.ResolveAlias(table.ColumnNames, LATITUDE_ALIASES);
    const longitude = ColumnResolver.ResolveAlias(table.ColumnNames, LONGITUDE_ALIASES);
    if (latitude === null || longitude === null) {
      const missing: Array<'latitude' | 'longitude'> = [];
      if (latitude === null) missing.push('latitude');
      if (longitude === null) missing.push('longitude');
      throw new MissingCoordinateColumnsError(missing, LATITUDE_ALIASES, LONGITUDE_ALIASES);
    }
    return { latitude, longitude };
  }

  /** Rows with a missing, non-numeric or out-of-range coordinate are skipped, not rejected. */
  public static BuildPlan(table: Table): WorldMapPlan {
    const { latitude, longitude } = WorldMapRenderer.ResolveCoordinateColumns(table);
    const points: Array<[number, number]> = [];
    let skippedRows = 0;

    for (let i = 0; i < table.RowCount; i++) {
      const lat = toFiniteNumber(table.GetCell(latitude, i));
      const lon = toFiniteNumber(table.GetCell(longitude, i));
      if (lat === null || lon === null || Math.abs(lat) > 90 || Math.abs(lon) > 180) {
        skippedRows++;
        continue;
      }
      points.push([lon, lat]);
    }

    return { latitudeColumn: latitude, longitudeColumn: longitude, points, skippedRows };
  }

  /** Marker area in points² to an ECharts symbol diameter in pixels. */
  public static MarkerDiameter(s: number, dpi: number): number {
    return (Math.sqrt(s) * dpi) / 72;
  }

  public static ResolveColor(c: string): string {
    if (Object.prototype.hasOwnProperty.call(COLOR_SHORTHANDS, c)) return COLOR_SHORTHANDS[c];
    return CssColors.IsNamed(c) ? c.toLowerCase() : c;
  }

  public static BuildFigure(table: Table, options: Readonly<WorldMapOptions>, settings: RenderSettings): ChartFigure {
    const plan = WorldMapRenderer.BuildPlan(table);
    if (plan.skippedRows > 0) {
      LogHelper.Warn('Skipped rows without usable coordinates', {
        skipped: plan.skippedRows,
        plotted: plan.points.length,
      });
    }
    const marker = MARKER_SYMBOLS[options.marker] ?? MARKER_SYMBOLS['o'];

    const option: EChartsOption = {
      ...baseOption(settings, options.title),
      geo: {
        map: WORLD_MAP_NAME,
        roam: false,
        // Plate carrée: one degree of longitude and latitude span the same number of pixels.
        aspectScale: 1,
        boundingCoords: [
          [-180, 90],
          [180, -90],
        ],
        left: 20,
        right: 20,
        top: options.title ? 50 : 20,
        bottom: 20,
        label: { show: false },
        itemStyle: { areaColor: '#efefef', borderColor: '#444444', borderWidth: 0.6 },
      },
      series: [
        {
          type: 'scatter',
          coordinateSystem: 'geo',
          data: plan.points,
          symbol: marker.symbol,
          symbolRotate: marker.rotate,
          symbolSize: WorldMapRenderer.MarkerDiameter(options.s, settings.dpi),
          itemStyle: { color: WorldMapRenderer.ResolveColor(options.c), opacity: options.alpha },
          silent: true,
        },
      ],
    };

    return { option, ...figureSize(settings), mapName: WORLD_MAP_NAME };
  }
}
