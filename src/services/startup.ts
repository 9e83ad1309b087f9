// src/services/startup.ts
// Phase one: load both inputs once. Phase two (rendering) only ever sees the frozen context.

import { DASHBOARD_CONFIG, type DashboardConfig } from "../config";
import { loadBoundaries, type BoundaryCollection } from "./boundaries";
import { DashboardError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { loadMetrics, type MetricTable } from "./metrics";

const log = createLogger("startup");

export type DashboardContext = Readonly<{
  metrics: MetricTable;
  boundaries: BoundaryCollection;
  loadedAt: number;
}>;

export type StartupResult =
  | { ok: true; context: DashboardContext }
  | { ok: false; errors: DashboardError[] };

type Loaders = {
  loadMetrics: typeof loadMetrics;
  loadBoundaries: typeof loadBoundaries;
};

const defaultLoaders: Loaders = { loadMetrics, loadBoundaries };

function asDashboardError(reason: unknown): DashboardError {
  return reason instanceof DashboardError
    ? reason
    : new DashboardError(errorMessage(reason), { cause: reason });
}

/**
 * Load metrics and boundaries concurrently. Never rejects: a failure in either
 * load is returned as a value so the page can show one message and stop.
 */
export async function bootstrapDashboard(
  config: DashboardConfig = DASHBOARD_CONFIG,
  loaders: Loaders = defaultLoaders
): Promise<StartupResult> {
  const { fetch: policy } = config;
  const [metrics, boundaries] = await Promise.allSettled([
    loaders.loadMetrics(config.metricsUrl, { ...policy, regionColumn: config.regionColumn }),
    loaders.loadBoundaries(config.boundariesUrl, { ...policy, regionKey: config.boundaryRegionKey }),
  ]);

  if (metrics.status === "fulfilled" && boundaries.status === "fulfilled") {
    return {
      ok: true,
      context: Object.freeze({
        metrics: metrics.value,
        boundaries: boundaries.value,
        loadedAt: Date.now(),
      }),
    };
  }

  const errors: DashboardError[] = [];
  if (metrics.status === "rejected") errors.push(asDashboardError(metrics.reason));
  if (boundaries.status === "rejected") errors.push(asDashboardError(boundaries.reason));
  errors.forEach((e) => log.error(e.message, e));
  return { ok: false, errors };
}
