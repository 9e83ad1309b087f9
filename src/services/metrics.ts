// src/services/metrics.ts
// Reagent metrics CSV → one aggregated row per region.

import Papa from "papaparse";
import { DASHBOARD_CONFIG } from "../config";
import { DataLoadError, errorMessage } from "./errors";
import { fetchText, type FetchOptions } from "./http";
import { createLogger } from "./logger";

const log = createLogger("metrics");

export type MetricRow = {
  region: string;
  values: Readonly<Record<string, number>>;
};

export type MetricTable = {
  regionColumn: string;
  /** Numeric columns, trimmed, in header order. */
  metrics: readonly string[];
  /** Sorted by region name; regions are unique. */
  rows: readonly MetricRow[];
};

export function normalizeRegionName(name: string): string {
  return name.trim();
}

function parseCell(raw: string | undefined, line: number, column: string): number {
  const text = (raw ?? "").trim();
  if (text === "") return 0;
  const n = Number(text);
  if (!Number.isFinite(n)) {
    throw new DataLoadError(`Line ${line}: column "${column}" is not numeric ("${text}")`);
  }
  return n;
}

function byName(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Parse the metrics CSV. The first physical line is a banner, the second the header.
 * Duplicate regions (e.g. several sites in one governorate) are summed into one row.
 */
export function parseMetricsCsv(
  text: string,
  regionColumn: string = DASHBOARD_CONFIG.regionColumn
): MetricTable {
  // No skipEmptyLines: the banner is dropped by position, even when it is blank
  const parsed = Papa.parse<string[]>(text, { delimiter: "," });
  if (parsed.errors.length) {
    const first = parsed.errors[0];
    throw new DataLoadError(`CSV parse error at row ${first.row ?? "?"}: ${first.message}`);
  }

  // [banner, header, ...data]
  const [, headerRow, ...dataRows] = parsed.data;
  if (!headerRow) throw new DataLoadError("CSV has no header row");

  const header = headerRow.map((h) => h.trim());
  const regionIdx = header.indexOf(regionColumn);
  if (regionIdx < 0) {
    throw new DataLoadError(`CSV header has no "${regionColumn}" column`);
  }

  const metricCols = header
    .map((name, idx) => ({ name, idx }))
    .filter((c) => c.idx !== regionIdx && c.name !== "");

  const groups = new Map<string, Record<string, number>>();
  let dropped = 0;

  dataRows.forEach((cells, i) => {
    const line = i + 3;
    if (cells.every((c) => c.trim() === "")) return;
    if (cells.length > header.length) {
      throw new DataLoadError(`Line ${line}: expected ${header.length} fields, got ${cells.length}`);
    }
    const region = normalizeRegionName(cells[regionIdx] ?? "");
    if (!region) {
      dropped++;
      return;
    }
    let acc = groups.get(region);
    if (!acc) {
      acc = Object.fromEntries(metricCols.map((c) => [c.name, 0]));
      groups.set(region, acc);
    }
    for (const c of metricCols) {
      acc[c.name] += parseCell(cells[c.idx], line, c.name);
    }
  });

  if (dropped) log.warn(`dropped ${dropped} row(s) without a region name`);

  const rows: MetricRow[] = [...groups.keys()]
    .sort(byName)
    .map((region) => Object.freeze({ region, values: Object.freeze(groups.get(region) ?? {}) }));

  return Object.freeze({
    regionColumn,
    metrics: Object.freeze(metricCols.map((c) => c.name)),
    rows: Object.freeze(rows),
  });
}

/** Fetch and parse the metrics CSV. Every failure surfaces as DataLoadError. */
export async function loadMetrics(
  url: string = DASHBOARD_CONFIG.metricsUrl,
  opt: Omit<FetchOptions<string>, "map"> & { regionColumn?: string } = {}
): Promise<MetricTable> {
  const { regionColumn, ...fetchOpt } = opt;
  const started = performance.now();
  let text: string;
  try {
    text = await fetchText(url, fetchOpt);
  } catch (err) {
    throw new DataLoadError(`Could not read ${url}: ${errorMessage(err)}`, { cause: err });
  }
  const table = parseMetricsCsv(text, regionColumn);
  log.info(
    `loaded ${table.rows.length} regions × ${table.metrics.length} metrics in ${Math.round(performance.now() - started)}ms`
  );
  return table;
}
