import type { NamedRegistry } from '../core/createNamedRegistry';
import { DuplicateNameError, RenderFailureError } from '../core/errors';
import { advanceLastUpdateTime, evaluateUpdate } from '../core/updatePolicy';
import { AUTO_UPDATE_KEY, PLOT_NAME_PREFIX, defaultConfigValues } from '../config/defaults';
import { resolvePlotOptions } from '../config/OptionResolver';
import type { Milliseconds, PlotOptions, Seconds } from '../config/types';
import type { DataSource, DataSourceListener } from '../data/DataSource';
import { isDataFile, loadDataFile } from '../data/loadDataFile';
import type { PlotContext } from './PlotContext';
import type {
  LegendOptions,
  PlotBinding,
  PlotFrame,
  PlotRenderer,
  RenderOptions,
  UpdateOutcome,
} from './types';

/** A data source, or a path to a `.dat` file to load into one. */
export type PlotSourceArg = DataSource | string;

/**
 * Base class for plots.
 *
 * Binds data sources, subscribes to their notifications and decides when the
 * renderer redraws. Subclasses choose which columns feed which axis
 * (`resolveBinding`); the renderer does the drawing.
 *
 * A non-forced `update()` redraws only when the plot's `autoUpdate` override
 * is not `false`, the context's global `auto-update` setting is on, and more
 * than `minTime` seconds have passed since the last redraw.
 */
export abstract class Plot<
  TBinding extends PlotBinding = PlotBinding,
  TBindOptions extends object = object,
  TRenderer extends PlotRenderer<TBinding> = PlotRenderer<TBinding>,
> {
  readonly name: string;

  protected readonly context: PlotContext;
  protected readonly renderer: TRenderer;

  private readonly _bindings: TBinding[] = [];
  private _maxPoints: number;
  private _maxTraces: number;
  private _minTime: Seconds;
  private _autoUpdate: boolean | undefined;
  private _lastUpdateTime: Milliseconds = 0;

  /**
   * @param sources - Data sources bound with `bindingOptions`, or `.dat` paths
   *   bound with default dimensions. Strings that do not name a file are skipped.
   * @throws {DuplicateNameError} If `options.name` is already registered
   * @throws {InvalidDimensionError} If `bindingOptions` names a column a source does not have
   * @throws {InvalidDataError} If a `.dat` path holds malformed data
   *
   * Nothing is subscribed or registered unless every source binds.
   */
  protected constructor(
    context: PlotContext,
    renderer: TRenderer,
    sources: ReadonlyArray<PlotSourceArg>,
    options: PlotOptions,
    bindingOptions: TBindOptions
  ) {
    const resolved = resolvePlotOptions(options);
    if (resolved.name.length > 0 && context.plots.has(resolved.name)) {
      throw new DuplicateNameError(resolved.name, context.plots.kind);
    }

    this.context = context;
    this.renderer = renderer;
    // Provisional: the counter advances only once every source has bound.
    this.name = resolved.name.length > 0 ? resolved.name : context.plots.peekUniqueName(PLOT_NAME_PREFIX);
    this._maxPoints = resolved.maxPoints;
    this._maxTraces = resolved.maxTraces;
    this._minTime = resolved.minTime;
    this._autoUpdate = resolved.autoUpdate;

    const bindings: TBinding[] = [];
    for (const source of sources) {
      if (typeof source !== 'string') {
        bindings.push(this.resolveBinding(source, bindingOptions));
      } else if (isDataFile(source)) {
        bindings.push(this.resolveBinding(loadDataFile(source)));
      } else {
        console.warn(`Plot ${this.name}: '${source}' is not a data file, skipping.`);
      }
    }

    if (resolved.name.length === 0) {
      context.plots.newUniqueName(PLOT_NAME_PREFIX);
    }
    for (const binding of bindings) this.attach(binding);
    context.plots.register(this.name, this);
  }

  /**
   * Picks the coordinate and value columns for a new binding.
   * Must throw `InvalidDimensionError` for explicit out-of-range columns.
   */
  protected abstract resolveBinding(source: DataSource, options?: TBindOptions): TBinding;

  get bindings(): ReadonlyArray<TBinding> {
    return this._bindings;
  }

  get maxPoints(): number {
    return this._maxPoints;
  }

  get maxTraces(): number {
    return this._maxTraces;
  }

  get minTime(): Seconds {
    return this._minTime;
  }

  get autoUpdate(): boolean | undefined {
    return this._autoUpdate;
  }

  get lastUpdateTime(): Milliseconds {
    return this._lastUpdateTime;
  }

  /**
   * Binds `source` to this plot and subscribes to its point and block
   * notifications. There is no limit on the number of bindings; `maxTraces`
   * is left to the renderer.
   */
  addData(source: DataSource, options?: TBindOptions): TBinding {
    const binding = this.resolveBinding(source, options);
    this.attach(binding);
    return binding;
  }

  private attach(binding: TBinding): void {
    this._bindings.push(binding);
    binding.source.on('new-data-point', this.handleNewDataPoint);
    binding.source.on('new-data-block', this.handleNewDataBlock);
  }

  /**
   * Redraws the plot if the throttle allows it (always, when `force` is set).
   *
   * Renderer exceptions are returned as a `failed` outcome carrying a
   * `RenderFailureError`, never thrown.
   */
  update(force = false, renderOptions: RenderOptions = {}): UpdateOutcome {
    const now = this.context.now();
    const decision = evaluateUpdate({
      force,
      now,
      lastUpdateTime: this._lastUpdateTime,
      minTime: this._minTime,
      autoUpdate: this._autoUpdate,
      readGlobalAutoUpdate: () =>
        this.context.config.get(AUTO_UPDATE_KEY, defaultConfigValues[AUTO_UPDATE_KEY]),
    });

    if (!decision.trigger) {
      return { status: 'skipped', reason: decision.reason };
    }

    this._lastUpdateTime = advanceLastUpdateTime(this._lastUpdateTime, now);
    try {
      this.renderer.render(this.createFrame(renderOptions));
    } catch (error) {
      return { status: 'failed', error: new RenderFailureError(this.name, error) };
    }
    return { status: 'rendered' };
  }

  setTitle(title: string): void {
    this.renderer.setTitle?.(title);
  }

  addLegend(options: LegendOptions = {}): void {
    this.renderer.addLegend?.(options);
  }

  setMaxPoints(value: number): void {
    this._maxPoints = assertLimit('setMaxPoints', value);
  }

  setMaxTraces(value: number): void {
    this._maxTraces = assertLimit('setMaxTraces', value);
  }

  setMinTime(value: Seconds): void {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`Plot.setMinTime(value): value must be a finite number >= 0. Received: ${String(value)}`);
    }
    this._minTime = value;
  }

  /** `undefined` hands the decision back to the global `auto-update` setting. */
  setAutoUpdate(value: boolean | undefined): void {
    this._autoUpdate = value;
  }

  protected createFrame(options: RenderOptions): PlotFrame<TBinding> {
    return {
      name: this.name,
      bindings: this._bindings.slice(),
      maxPoints: this._maxPoints,
      maxTraces: this._maxTraces,
      options,
    };
  }

  // Point notifications log render failures.
  private readonly handleNewDataPoint: DataSourceListener = () => {
    const outcome = this.update(false);
    if (outcome.status === 'failed') {
      console.warn(outcome.error.message);
    }
  };

  // Block notifications hand render failures back to the emitting source.
  private readonly handleNewDataBlock: DataSourceListener = () => {
    const outcome = this.update(false);
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
  };

  static getNamedList(context: PlotContext): NamedRegistry<Plot> {
    return context.plots;
  }

  /**
   * @throws {NotFoundError} If no plot is registered under `name`
   */
  static get(context: PlotContext, name: string): Plot {
    return context.plots.lookup(name);
  }
}

const assertLimit = (method: string, value: number): number => {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`Plot.${method}(value): value must be a positive integer. Received: ${String(value)}`);
  }
  return value;
};
