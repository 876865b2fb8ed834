export type PlotErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_NAME'
  | 'INVALID_DIMENSION'
  | 'INVALID_DATA'
  | 'RENDER_FAILURE';

/**
 * Base class for every error thrown (or returned) by this library.
 * `code` is stable and meant for programmatic checks; messages are not.
 */
export class PlotError extends Error {
  readonly code: PlotErrorCode;

  constructor(code: PlotErrorCode, message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = 'PlotError';
    this.code = code;
  }
}

export class NotFoundError extends PlotError {
  readonly key: string;

  constructor(key: string, kind = 'Item') {
    super('NOT_FOUND', `${kind} '${key}' not found.`);
    this.name = 'NotFoundError';
    this.key = key;
  }
}

export class DuplicateNameError extends PlotError {
  readonly key: string;

  constructor(key: string, kind = 'Item') {
    super('DUPLICATE_NAME', `${kind} '${key}' is already registered.`);
    this.name = 'DuplicateNameError';
    this.key = key;
  }
}

export class InvalidDimensionError extends PlotError {
  readonly dimension: number;
  readonly columnCount: number;

  constructor(context: string, dimension: number, columnCount: number) {
    super(
      'INVALID_DIMENSION',
      `${context}: column index ${String(dimension)} is out of range (source has ${columnCount} columns).`
    );
    this.name = 'InvalidDimensionError';
    this.dimension = dimension;
    this.columnCount = columnCount;
  }
}

export class InvalidDataError extends PlotError {
  constructor(message: string) {
    super('INVALID_DATA', message);
    this.name = 'InvalidDataError';
  }
}

export class RenderFailureError extends PlotError {
  readonly plotName: string;

  constructor(plotName: string, cause: unknown) {
    super('RENDER_FAILURE', `Failed to update plot ${plotName}: ${describeCause(cause)}`, { cause });
    this.name = 'RenderFailureError';
    this.plotName = plotName;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function isPlotError(value: unknown): value is PlotError {
  return value instanceof PlotError;
}
