// src/config.ts
// Everything the dashboard needs to know about its inputs, in one place.

export type FetchPolicy = {
  /** Abort a single attempt after this many ms. */
  timeoutMs: number;
  /** Extra attempts on network errors and 5xx. */
  retries: number;
  /** First backoff step; doubles on every retry. */
  backoffMs: number;
};

export type DashboardConfig = {
  title: string;
  subtitle: string;
  /** CSV with a banner line, then a header row, then one row per site. */
  metricsUrl: string;
  /** GeoJSON FeatureCollection with one polygon per governorate. */
  boundariesUrl: string;
  /** CSV column holding the region name. */
  regionColumn: string;
  /** Feature property holding the region name. */
  boundaryRegionKey: string;
  fetch: FetchPolicy;
  colors: {
    missing: string;
    low: string;
    average: string;
    high: string;
  };
};

export const DASHBOARD_CONFIG = Object.freeze({
  title: "Reagent Atlas",
  subtitle: "Laboratory reagent usage by governorate",
  metricsUrl: "/dataheatmap.csv",
  boundariesUrl:
    "https://raw.githubusercontent.com/mtimet/tnacmaps/master/geojson/governorates.geojson",
  regionColumn: "Location",
  boundaryRegionKey: "gov_name_f",
  fetch: { timeoutMs: 12000, retries: 2, backoffMs: 500 },
  colors: {
    missing: "#E2E8F0",
    low: "#E74C3C",
    average: "#F1C40F",
    high: "#2ECC71",
  },
} as const satisfies DashboardConfig);
