import type { DataSource } from '../data/DataSource';
import type { RenderFailureError } from '../core/errors';
import type { UpdateSkipReason } from '../core/updatePolicy';

export type AxisRole = 'right' | 'top';

export interface PlotBinding {
  /** Shared with any other plot bound to the same source. */
  readonly source: DataSource;
  readonly coordinateDims: ReadonlyArray<number>;
  readonly valueDim: number;
}

export interface Plot2DBinding extends PlotBinding {
  readonly coordinateDims: readonly [x: number];
  /** Marks a binding that feeds the secondary (right or top) axis. */
  readonly axisRole?: AxisRole;
}

export interface Plot3DBinding extends PlotBinding {
  readonly coordinateDims: readonly [x: number, y: number];
}

export interface Plot2DBindingOptions {
  /** Coordinate column. @default 0 */
  readonly coordDim?: number;
  /** Value column. @default the source's coordinate count, at least 1 */
  readonly valDim?: number;
  readonly axisRole?: AxisRole;
}

export interface Plot3DBindingOptions {
  /** Coordinate columns. @default [0, 1] */
  readonly coordDims?: readonly [number, number];
  /** Value column. @default the source's coordinate count, at least 2 */
  readonly valDim?: number;
}

export type RenderOptions = Readonly<Record<string, unknown>>;

/**
 * Everything a renderer needs for one redraw.
 */
export interface PlotFrame<TBinding extends PlotBinding = PlotBinding> {
  readonly name: string;
  readonly bindings: ReadonlyArray<TBinding>;
  readonly maxPoints: number;
  readonly maxTraces: number;
  readonly options: RenderOptions;
}

export interface LegendOptions {
  readonly show?: boolean;
  readonly position?: 'top' | 'bottom' | 'left' | 'right';
}

/**
 * Drawing backend for a plot. Only `render` is required; the optional hooks
 * are called when present and skipped otherwise.
 */
export interface PlotRenderer<TBinding extends PlotBinding = PlotBinding> {
  render(frame: PlotFrame<TBinding>): void;
  setTitle?(title: string): void;
  addLegend?(options: LegendOptions): void;
}

export interface Plot2DRenderer extends PlotRenderer<Plot2DBinding> {
  setXLabel(label: string, placement?: { readonly right?: boolean }): void;
  setYLabel(label: string, placement?: { readonly top?: boolean }): void;
  plotXY?(x: ReadonlyArray<number>, y: ReadonlyArray<number>): void;
}

export interface Plot3DRenderer extends PlotRenderer<Plot3DBinding> {
  setXLabel(label: string): void;
  setYLabel(label: string): void;
  setZLabel(label: string): void;
  plotXYZ?(x: ReadonlyArray<number>, y: ReadonlyArray<number>, z: ReadonlyArray<number>): void;
}

export type UpdateOutcome =
  | Readonly<{ readonly status: 'rendered' }>
  | Readonly<{ readonly status: 'skipped'; readonly reason: UpdateSkipReason }>
  | Readonly<{ readonly status: 'failed'; readonly error: RenderFailureError }>;
