export type TrendsErrorCode =
  | 'MalformedTimeframe'
  | 'UnsupportedPrecision'
  | 'InconsistentResolution'
  | 'SpanRatioExceeded'
  | 'ShapeMismatch'
  | 'UnresolvedCode'
  | 'DecodeError'
  | 'EmptyResult'
  | 'PointCountMismatch'
  | 'BatchSizeExceeded'
  | 'UpstreamRequest'
  | 'QuotaExceeded';

/**
 * Base class for every recoverable condition surfaced to callers.
 * `details` carries the offending input so the failure can be reproduced.
 */
export class TrendsError extends Error {
  readonly fatal: boolean = true;

  constructor(
    readonly code: TrendsErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedTimeframeError extends TrendsError {
  constructor(readonly timeframe: string, reason: string) {
    super('MalformedTimeframe', `Malformed timeframe "${timeframe}": ${reason}`, {
      timeframe,
    });
  }
}

export class UnsupportedPrecisionError extends TrendsError {
  constructor(readonly timeframe: string, reason: string) {
    super(
      'UnsupportedPrecision',
      `Unsupported precision in timeframe "${timeframe}": ${reason}`,
      { timeframe }
    );
  }
}

export class InconsistentResolutionError extends TrendsError {
  constructor(readonly timeframes: string[], readonly resolutions: string[]) {
    super(
      'InconsistentResolution',
      `Timeframes do not share a resolution: ` +
        timeframes.map((t, i) => `"${t}" (${resolutions[i]})`).join(', '),
      { timeframes, resolutions }
    );
  }
}

export class SpanRatioExceededError extends TrendsError {
  constructor(
    readonly longest: string,
    readonly shortest: string,
    readonly ratio: number
  ) {
    super(
      'SpanRatioExceeded',
      `Timeframe "${longest}" is ${ratio.toFixed(2)}x longer than "${shortest}" (limit 2x)`,
      { longest, shortest, ratio }
    );
  }
}

export class ShapeMismatchError extends TrendsError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('ShapeMismatch', message, details);
  }
}

export class UnresolvedCodeError extends TrendsError {
  constructor(readonly field: 'geo' | 'category', readonly value: string) {
    super(
      'UnresolvedCode',
      `Unresolved ${field} code "${value}": look it up before building the request`,
      { field, value }
    );
  }
}

export class DecodeError extends TrendsError {
  constructor(readonly shape: string, reason: string) {
    super('DecodeError', `Cannot decode ${shape} payload: ${reason}`, { shape });
  }
}

/**
 * Well-formed payload that carries no data (e.g. an obscure keyword).
 */
export class EmptyResultError extends TrendsError {
  override readonly fatal = false;

  constructor(readonly shape: string, readonly subjects: string[]) {
    super(
      'EmptyResult',
      `No ${shape} data returned for ${subjects.map((s) => `"${s}"`).join(', ') || 'request'}`,
      { shape, subjects }
    );
  }
}

export class PointCountMismatchError extends TrendsError {
  constructor(
    readonly keyword: string,
    readonly expected: number,
    readonly actual: number
  ) {
    super(
      'PointCountMismatch',
      `Keyword "${keyword}" has ${actual} points, expected ${expected}`,
      { keyword, expected, actual }
    );
  }
}

export class BatchSizeExceededError extends TrendsError {
  constructor(readonly kind: string, readonly size: number, readonly limit: number) {
    super(
      'BatchSizeExceeded',
      `${kind} request has ${size} items, upstream limit is ${limit}`,
      { kind, size, limit }
    );
  }
}

export class UpstreamRequestError extends TrendsError {
  constructor(readonly url: string, readonly status: number, reason: string) {
    super('UpstreamRequest', `Upstream request failed (${status}) for ${url}: ${reason}`, {
      url,
      status,
    });
  }
}

export class QuotaExceededError extends TrendsError {
  constructor(readonly widget: string) {
    super(
      'QuotaExceeded',
      `Upstream quota exceeded for ${widget}; wait before retrying or raise the request delay`,
      { widget }
    );
  }
}
