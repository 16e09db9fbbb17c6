import type { EChartsOption } from 'echarts';
import type { RenderSettings } from '../utils/moduleConfig';

/**
 * What a renderer hands to the encoder: a declarative ECharts option plus the pixel
 * size to draw it at. `mapName` names a registered geo map the option refers to.
 */
export interface ChartFigure {
  readonly option: EChartsOption;
  readonly width: number;
  readonly height: number;
  readonly mapName?: string;
}

export function figureSize(settings: RenderSettings): { width: number; height: number } {
  return {
    width: Math.round(settings.widthInches * settings.dpi),
    height: Math.round(settings.heightInches * settings.dpi),
  };
}

/** Options shared by every chart kind. Animation is off so a single render pass is final. */
export function baseOption(settings: RenderSettings, title?: string): EChartsOption {
  return {
    animation: false,
    backgroundColor: settings.backgroundColor,
    textStyle: { fontFamily: settings.fontFamily },
    title: title ? { text: title, left: 'center', top: 8 } : undefined,
  };
}

/** Top offset that keeps the plot area clear of an optional title and legend. */
export function topOffset(hasTitle: boolean, hasLegend: boolean): number {
  return 30 + (hasTitle ? 30 : 0) + (hasLegend ? 30 : 0);
}
