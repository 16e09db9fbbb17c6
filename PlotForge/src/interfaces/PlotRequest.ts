import { Table } from './Table';

export const PLOT_KINDS = ['line', 'bar', 'pie', 'worldmap'] as const;

export type PlotKind = (typeof PLOT_KINDS)[number];

export function isPlotKind(value: string): value is PlotKind {
  return PLOT_KINDS.some(k => k === value);
}

export interface CartesianOptions {
  x?: string;
  y?: string;
  hue?: string;
  title?: string;
}

export interface PieOptions {
  labels?: string;
  values?: string;
  title?: string;
}

export interface WorldMapOptions {
  /** Marker area in points squared. */
  s: number;
  c: string;
  alpha: number;
  marker: string;
  title?: string;
}

/** A plot kind paired with its closed, validated options record. */
export type PlotSelection =
  | { readonly kind: 'line'; readonly options: Readonly<CartesianOptions> }
  | { readonly kind: 'bar'; readonly options: Readonly<CartesianOptions> }
  | { readonly kind: 'pie'; readonly options: Readonly<PieOptions> }
  | { readonly kind: 'worldmap'; readonly options: Readonly<WorldMapOptions> };

/**
 * One validated plotting request. Each kind carries its own options record,
 * so a renderer only ever sees the fields it understands.
 */
export type PlotRequest = PlotSelection & { readonly table: Table };
