// src/services/errors.ts

export class DashboardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Non-2xx response. `status` decides whether fetchWithRetry tries again. */
export class HttpError extends DashboardError {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number) {
    super(`HTTP ${status} for ${url}`);
    this.status = status;
    this.url = url;
  }
}

/** The metrics CSV could not be fetched or parsed. */
export class DataLoadError extends DashboardError {}

/** The boundary document could not be fetched or is not a usable FeatureCollection. */
export class GeoLoadError extends DashboardError {}

/** The active metric has no usable values (empty dataset, unknown column, zero average). */
export class MetricUnavailableError extends DashboardError {
  readonly metric: string;

  constructor(metric: string, reason: string) {
    super(`Metric "${metric}" is unavailable: ${reason}`);
    this.metric = metric;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
