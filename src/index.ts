/**
 * streamplot - binds streaming measurement data to plots and throttles their redraws
 */

export const version = '1.0.0';

// Plots
export { Plot } from './plot/Plot';
export type { PlotSourceArg } from './plot/Plot';
export { Plot2D } from './plot/Plot2D';
export type { Plot2DLabels, Plot2DOptions } from './plot/Plot2D';
export { Plot3D } from './plot/Plot3D';
export type { Plot3DLabels, Plot3DOptions } from './plot/Plot3D';
export { createPlotContext } from './plot/PlotContext';
export type { PlotContext, PlotContextInit } from './plot/PlotContext';
export type {
  AxisRole,
  LegendOptions,
  Plot2DBinding,
  Plot2DBindingOptions,
  Plot2DRenderer,
  Plot3DBinding,
  Plot3DBindingOptions,
  Plot3DRenderer,
  PlotBinding,
  PlotFrame,
  PlotRenderer,
  RenderOptions,
  UpdateOutcome,
} from './plot/types';

// Update policy
export { advanceLastUpdateTime, evaluateUpdate } from './core/updatePolicy';
export type { UpdateDecision, UpdatePolicyInput, UpdateSkipReason } from './core/updatePolicy';

// Registry
export { createNamedRegistry } from './core/createNamedRegistry';
export type {
  NamedRegistry,
  NamedRegistryEventName,
  NamedRegistryEventPayload,
  NamedRegistryListener,
} from './core/createNamedRegistry';

// Errors
export {
  DuplicateNameError,
  InvalidDataError,
  InvalidDimensionError,
  NotFoundError,
  PlotError,
  RenderFailureError,
  isPlotError,
} from './core/errors';
export type { PlotErrorCode } from './core/errors';

// Configuration
export { AUTO_UPDATE_KEY, PLOT_NAME_PREFIX, defaultConfigValues, defaultPlotOptions } from './config/defaults';
export { resolveConfigValues, resolvePlotOptions } from './config/OptionResolver';
export { createConfigStore } from './config/createConfigStore';
export type { ConfigChangeListener, ConfigChangePayload, ConfigStore } from './config/createConfigStore';
export type {
  ConfigKey,
  ConfigValues,
  Milliseconds,
  PlotOptions,
  ResolvedPlotOptions,
  Seconds,
} from './config/types';

// Data
export { getColumnCount } from './data/DataSource';
export type {
  ColumnInfo,
  ColumnType,
  DataSource,
  DataSourceEventName,
  DataSourceListener,
} from './data/DataSource';
export { createDataSource, formatColumnLabel } from './data/createDataSource';
export type { DataSourceInit, MemoryDataSource } from './data/createDataSource';
export { parseDataFile, parseDataFileContent } from './data/parseDataFile';
export type { ParseDataFileOptions, ParsedDataFile } from './data/parseDataFile';
export { isDataFile, loadDataFile } from './data/loadDataFile';
