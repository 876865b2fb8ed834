/**
 * Plot configuration types.
 */

/** Wall-clock milliseconds, as returned by the context clock. */
export type Milliseconds = number;

/** Durations given in seconds (`minTime`). */
export type Seconds = number;

/**
 * Options shared by every plot.
 */
export interface PlotOptions {
  /** Registry name. Empty or omitted means `plot<n>`. */
  readonly name?: string;
  /**
   * Maximum number of points a renderer should show per trace.
   * Advisory: the plot itself never drops data.
   *
   * @default 10000
   */
  readonly maxPoints?: number;
  /**
   * Maximum number of traces a renderer should keep.
   * Advisory, like `maxPoints`.
   *
   * @default 5
   */
  readonly maxTraces?: number;
  /**
   * Minimum time between two non-forced redraws, in seconds.
   *
   * @default 1
   */
  readonly minTime?: Seconds;
  /**
   * Per-plot auto-update override.
   *
   * - `undefined` (default): follow the global `auto-update` setting
   * - `false`: never redraw unless forced
   * - `true`: same as `undefined`
   */
  readonly autoUpdate?: boolean;
}

export interface ResolvedPlotOptions {
  readonly name: string;
  readonly maxPoints: number;
  readonly maxTraces: number;
  readonly minTime: Seconds;
  readonly autoUpdate: boolean | undefined;
}

/**
 * Process-wide settings read by plots.
 */
export interface ConfigValues {
  /** Global auto-update flag; plots without an override follow it. */
  readonly 'auto-update': boolean;
}

export type ConfigKey = keyof ConfigValues;
