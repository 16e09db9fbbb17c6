import * as echarts from 'echarts';
import { Resvg } from '@resvg/resvg-js';
import { PNG_MIME_TYPE, RenderedImage } from '../interfaces/RenderedImage';
import { ChartFigure } from '../renderers/ChartFigure';
import { WORLD_MAP_NAME, WorldOutline } from '../renderers/WorldOutline';
import { getRenderSettings, RenderSettings } from '../utils/moduleConfig';

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export class PngEncoder {
  /**
   * Draw the figure with a fresh server-side ECharts instance (SVG renderer) and rasterize
   * the SVG to PNG at the figure's pixel size. The chart instance is disposed whether or
   * not drawing succeeds, so repeated calls do not accumulate instances.
   */
  public static Encode(figure: ChartFigure, settings: RenderSettings = getRenderSettings()): RenderedImage {
    if (figure.mapName === WORLD_MAP_NAME) {
      WorldOutline.EnsureRegistered();
    }

    const chart = echarts.init(null, null, {
      renderer: 'svg',
      ssr: true,
      width: figure.width,
      height: figure.height,
    });

    let svg: string;
    try {
      chart.setOption(figure.option);
      svg = chart.renderToSVGString();
    } finally {
      chart.dispose();
    }

    const resvg = new Resvg(svg, {
      fitTo: { mode: 'width', value: figure.width },
      background: settings.backgroundColor,
      font: {
        loadSystemFonts: true,
        defaultFontFamily: settings.fontFamily,
      },
    });
    const rendered = resvg.render();

    return {
      data: rendered.asPng(),
      mimeType: PNG_MIME_TYPE,
      width: rendered.width,
      height: rendered.height,
    };
  }

  /** Width and height from the IHDR chunk, or null when the buffer is not a PNG. */
  public static ReadDimensions(png: Buffer): { width: number; height: number } | null {
    if (png.length < 24 || !png.subarray(0, 8).equals(PNG_SIGNATURE)) return null;
    return { width: png.readUInt32BE(16), height: png.readUInt32BE(20) };
  }
}
