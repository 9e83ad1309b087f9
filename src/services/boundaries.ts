// src/services/boundaries.ts
// Governorate boundary polygons (GeoJSON FeatureCollection).

import type { Feature, FeatureCollection, Geometry } from "geojson";
import { z } from "zod";
import { DASHBOARD_CONFIG } from "../config";
import { GeoLoadError, errorMessage } from "./errors";
import { fetchJson, type FetchOptions } from "./http";
import { createLogger } from "./logger";
import { normalizeRegionName } from "./metrics";

const log = createLogger("boundaries");

export type BoundaryProperties = { [key: string]: unknown };

export type RegionFeature = Feature<Geometry, BoundaryProperties>;

export type BoundaryCollection = {
  /** Property holding the region name on every feature. */
  regionKey: string;
  collection: FeatureCollection<Geometry, BoundaryProperties>;
  /** Normalized region name of each feature, in feature order. */
  regions: readonly string[];
};

const GEOMETRY_TYPES = new Set([
  "Point",
  "MultiPoint",
  "LineString",
  "MultiLineString",
  "Polygon",
  "MultiPolygon",
  "GeometryCollection",
]);

function isGeometry(v: unknown): v is Geometry {
  if (typeof v !== "object" || v === null) return false;
  if (!("type" in v) || typeof v.type !== "string" || !GEOMETRY_TYPES.has(v.type)) return false;
  if (v.type === "GeometryCollection") {
    return "geometries" in v && Array.isArray(v.geometries) && v.geometries.every(isGeometry);
  }
  return "coordinates" in v && Array.isArray(v.coordinates);
}

const featureSchema = z.object({
  type: z.literal("Feature"),
  properties: z.record(z.string(), z.unknown()),
  geometry: z.custom<Geometry>(isGeometry, { message: "Invalid GeoJSON geometry" }),
});

const collectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(featureSchema),
});

/** Validate a parsed boundary document; every feature must carry a region name. */
export function parseBoundaries(
  json: unknown,
  regionKey: string = DASHBOARD_CONFIG.boundaryRegionKey
): BoundaryCollection {
  const result = collectionSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new GeoLoadError(`Malformed boundary document${where}: ${issue.message}`);
  }

  const features: RegionFeature[] = [];
  const regions: string[] = [];
  result.data.features.forEach((f, i) => {
    const name = f.properties[regionKey];
    if (typeof name !== "string" || !name.trim()) {
      throw new GeoLoadError(`Feature ${i} has no "${regionKey}" property`);
    }
    regions.push(normalizeRegionName(name));
    features.push({ type: "Feature", properties: f.properties, geometry: f.geometry });
  });

  const parsed: BoundaryCollection = {
    regionKey,
    collection: { type: "FeatureCollection", features },
    regions: Object.freeze(regions),
  };
  return Object.freeze(parsed);
}

/** Fetch the boundary document. Every failure surfaces as GeoLoadError. */
export async function loadBoundaries(
  url: string = DASHBOARD_CONFIG.boundariesUrl,
  opt: Omit<FetchOptions<BoundaryCollection>, "map"> & { regionKey?: string } = {}
): Promise<BoundaryCollection> {
  const { regionKey, ...fetchOpt } = opt;
  let boundaries: BoundaryCollection;
  try {
    boundaries = await fetchJson(url, { ...fetchOpt, map: (body) => parseBoundaries(body, regionKey) });
  } catch (err) {
    if (err instanceof GeoLoadError) throw err;
    throw new GeoLoadError(`Could not fetch boundaries from ${url}: ${errorMessage(err)}`, { cause: err });
  }
  log.info(`loaded ${boundaries.regions.length} boundary features`);
  return boundaries;
}
