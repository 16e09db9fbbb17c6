/*
 * Copyright 2026 Mark Isham
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

export { PlotError, MalformedInputError, InvalidOptionsError, UnsupportedPlotKindError, ColumnNotFoundError, MissingCoordinateColumnsError, AmbiguousShapeError, InvalidValueError } from './errors/PlotErrors';
export type { PlotErrorCode } from './errors/PlotErrors';
export { Table } from './interfaces/Table';
export type { Column, ColumnType, CellValue, NumericColumn, TextColumn, TemporalColumn } from './interfaces/Table';
export { PLOT_KINDS, isPlotKind } from './interfaces/PlotRequest';
export type { PlotKind, PlotRequest, PlotSelection, CartesianOptions, PieOptions, WorldMapOptions } from './interfaces/PlotRequest';
export { PNG_MIME_TYPE } from './interfaces/RenderedImage';
export type { RenderedImage } from './interfaces/RenderedImage';
export { TableParser } from './parser/TableParser';
export { OptionsDecoder, NO_OPTIONS_SENTINEL } from './processor/OptionsDecoder';
export { PlotDispatcher } from './processor/PlotDispatcher';
export type { RawOptions } from './processor/PlotDispatcher';
export { PlotService, PLOT_SUCCESS_MESSAGE } from './processor/PlotService';
export type { PlotResult } from './processor/PlotService';
export type { ChartFigure } from './renderers/ChartFigure';
export { ColumnResolver, LATITUDE_ALIASES, LONGITUDE_ALIASES } from './renderers/ColumnResolver';
export { CartesianRenderer, INDEX_AXIS_NAME } from './renderers/CartesianRenderer';
export type { CartesianPlan } from './renderers/CartesianRenderer';
export { PieRenderer } from './renderers/PieRenderer';
export type { PieSlice } from './renderers/PieRenderer';
export { WorldMapRenderer, DEFAULT_WORLD_MAP_OPTIONS, MARKER_NAMES, isKnownMarker } from './renderers/WorldMapRenderer';
export { PngEncoder, PNG_SIGNATURE } from './encoder/PngEncoder';
export { ErrorHelper } from './utils/ErrorHelper';
export { LogHelper, LOG_SEVERITIES } from './utils/LogHelper';
export type { LogSeverity, LogStream } from './utils/LogHelper';
export { StringUtils } from './utils/StringUtils';
export { getRenderSettings, getServerBodyLimit, loadModuleConfig } from './utils/moduleConfig';
export type { RenderSettings } from './utils/moduleConfig';
