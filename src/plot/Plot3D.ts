import type { PlotOptions } from '../config/types';
import type { DataSource } from '../data/DataSource';
import { Plot } from './Plot';
import type { PlotSourceArg } from './Plot';
import type { PlotContext } from './PlotContext';
import { assertColumn } from './assertColumn';
import type { Plot3DBinding, Plot3DBindingOptions, Plot3DRenderer } from './types';

export type Plot3DOptions = PlotOptions & Plot3DBindingOptions;

export interface Plot3DLabels {
  readonly x?: string;
  readonly y?: string;
  readonly z?: string;
}

/**
 * Plot of one value column over two coordinate columns per data source.
 */
export class Plot3D extends Plot<Plot3DBinding, Plot3DBindingOptions, Plot3DRenderer> {
  constructor(
    context: PlotContext,
    renderer: Plot3DRenderer,
    sources: ReadonlyArray<PlotSourceArg> = [],
    options: Plot3DOptions = {}
  ) {
    super(context, renderer, sources, options, { coordDims: options.coordDims, valDim: options.valDim });
  }

  /**
   * Defaults: coordinate columns 0 and 1, value column right after the
   * coordinates (at least 2, since two columns are always taken as
   * coordinates).
   */
  protected resolveBinding(source: DataSource, options: Plot3DBindingOptions = {}): Plot3DBinding {
    const { coordDims, valDim } = options;

    let coordinates: readonly [number, number];
    if (coordDims === undefined) {
      if (source.getCoordinateCount() > 2) {
        console.info('Data source has multiple coordinates, using the first two');
      }
      coordinates = [0, 1];
    } else {
      coordinates = [
        assertColumn(source, coordDims[0], `Plot3D(${this.name}).addData(coordDims[0])`),
        assertColumn(source, coordDims[1], `Plot3D(${this.name}).addData(coordDims[1])`),
      ];
    }

    let value: number;
    if (valDim === undefined) {
      if (source.getValueCount() > 1) {
        console.info('Data source has multiple values, using the first one');
      }
      value = Math.max(source.getCoordinateCount(), 2);
    } else {
      value = assertColumn(source, valDim, `Plot3D(${this.name}).addData(valDim)`);
    }

    return { source, coordinateDims: coordinates, valueDim: value };
  }

  /**
   * Sets axis labels. Empty ones are derived from the first binding only;
   * labels that stay empty are not set.
   */
  setLabels(labels: Plot3DLabels = {}): void {
    let x = labels.x ?? '';
    let y = labels.y ?? '';
    let z = labels.z ?? '';

    const first = this.bindings[0];
    if (first !== undefined) {
      const { source } = first;
      if (x === '') x = source.formatLabel(first.coordinateDims[0]);
      if (y === '') y = source.formatLabel(first.coordinateDims[1]);
      if (z === '') z = source.formatLabel(first.valueDim);
    }

    if (x !== '') this.renderer.setXLabel(x);
    if (y !== '') this.renderer.setYLabel(y);
    if (z !== '') this.renderer.setZLabel(z);
  }

  setXLabel(label: string): void {
    this.renderer.setXLabel(label);
  }

  setYLabel(label: string): void {
    this.renderer.setYLabel(label);
  }

  setZLabel(label: string): void {
    this.renderer.setZLabel(label);
  }

  /** Draws a one-off x/y/z surface when the renderer supports it. */
  plotXYZ(x: ReadonlyArray<number>, y: ReadonlyArray<number>, z: ReadonlyArray<number>): void {
    this.renderer.plotXYZ?.(x, y, z);
  }
}
