import type { PlotOptions } from '../config/types';
import type { DataSource } from '../data/DataSource';
import { Plot } from './Plot';
import type { PlotSourceArg } from './Plot';
import type { PlotContext } from './PlotContext';
import { assertColumn } from './assertColumn';
import type { Plot2DBinding, Plot2DBindingOptions, Plot2DRenderer } from './types';

/** Dimension options applied to the data sources given to the constructor. */
export type Plot2DOptions = PlotOptions & Pick<Plot2DBindingOptions, 'coordDim' | 'valDim'>;

export interface Plot2DLabels {
  readonly left?: string;
  readonly bottom?: string;
  readonly right?: string;
  readonly top?: string;
}

/**
 * Plot of one value column against one coordinate column per data source.
 */
export class Plot2D extends Plot<Plot2DBinding, Plot2DBindingOptions, Plot2DRenderer> {
  constructor(
    context: PlotContext,
    renderer: Plot2DRenderer,
    sources: ReadonlyArray<PlotSourceArg> = [],
    options: Plot2DOptions = {}
  ) {
    super(context, renderer, sources, options, { coordDim: options.coordDim, valDim: options.valDim });
  }

  /**
   * Defaults: coordinate column 0, value column right after the coordinates
   * (at least 1). Omitting a choice on a source that offers several columns
   * logs a notice.
   */
  protected resolveBinding(source: DataSource, options: Plot2DBindingOptions = {}): Plot2DBinding {
    const { coordDim, valDim, axisRole } = options;

    let coordinate: number;
    if (coordDim === undefined) {
      if (source.getCoordinateCount() > 1) {
        console.info('Data source has multiple coordinates, using the first one');
      }
      coordinate = 0;
    } else {
      coordinate = assertColumn(source, coordDim, `Plot2D(${this.name}).addData(coordDim)`);
    }

    let value: number;
    if (valDim === undefined) {
      if (source.getValueCount() > 1) {
        console.info('Data source has multiple values, using the first one');
      }
      value = Math.max(source.getCoordinateCount(), 1);
    } else {
      value = assertColumn(source, valDim, `Plot2D(${this.name}).addData(valDim)`);
    }

    return {
      source,
      coordinateDims: [coordinate],
      valueDim: value,
      ...(axisRole !== undefined ? { axisRole } : {}),
    };
  }

  /**
   * Sets axis labels, deriving empty ones from the bound sources.
   *
   * Coordinate labels go to `left` (or `right` for bindings with axis role
   * `'right'`), value labels to `bottom` (or `top`). The first binding to fill
   * an empty label wins. Labels still empty afterwards are not set.
   */
  setLabels(labels: Plot2DLabels = {}): void {
    let left = labels.left ?? '';
    let bottom = labels.bottom ?? '';
    let right = labels.right ?? '';
    let top = labels.top ?? '';

    for (const binding of this.bindings) {
      const { source } = binding;
      if (binding.axisRole === 'right' && right === '') {
        right = source.formatLabel(binding.coordinateDims[0]);
      } else if (left === '') {
        left = source.formatLabel(binding.coordinateDims[0]);
      }

      if (binding.axisRole === 'top' && top === '') {
        top = source.formatLabel(binding.valueDim);
      } else if (bottom === '') {
        bottom = source.formatLabel(binding.valueDim);
      }
    }

    if (left !== '') this.renderer.setXLabel(left);
    if (right !== '') this.renderer.setXLabel(right, { right: true });
    if (bottom !== '') this.renderer.setYLabel(bottom);
    if (top !== '') this.renderer.setYLabel(top, { top: true });
  }

  setXLabel(label: string, placement?: { readonly right?: boolean }): void {
    this.renderer.setXLabel(label, placement);
  }

  setYLabel(label: string, placement?: { readonly top?: boolean }): void {
    this.renderer.setYLabel(label, placement);
  }

  /** Draws a one-off x/y trace when the renderer supports it. */
  plotXY(x: ReadonlyArray<number>, y: ReadonlyArray<number>): void {
    this.renderer.plotXY?.(x, y);
  }
}
