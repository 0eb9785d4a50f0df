/*********************************************************************
 * src/routeGeometry.ts
 *
 * Map‑ready renditions of the course. The full track of an ultra race
 * runs to tens of thousands of points, so the map gets three resolutions:
 *
 *   full    – every sample
 *   medium  – Douglas‑Peucker at ~10 m
 *   coarse  – Douglas‑Peucker at ~100 m
 *********************************************************************/

import simplify from "simplify-js";
import type { RouteModel } from "./routeModel.ts";
import type { BoundingBox, DistanceUnit } from "./types.ts";

export type Resolution = "full" | "medium" | "coarse";

export const RESOLUTIONS: readonly Resolution[] = ["full", "medium", "coarse"];

const TARGET_METERS: Record<Exclude<Resolution, "full">, number> = {
  medium: 10,
  coarse: 100,
};

/** GeoJSON position: [lon, lat, ele] */
export type Position = [number, number, number];

export interface CourseFeatureCollection {
  type: "FeatureCollection";
  features: [
    {
      type: "Feature";
      properties: {
        resolution: Resolution;
        totalDistance: number;
        unit: DistanceUnit;
        totalGain: number;
      };
      geometry: { type: "LineString"; coordinates: Position[] };
    },
  ];
}

export function isResolution(value: string): value is Resolution {
  return RESOLUTIONS.some((r) => r === value);
}

export function routeBoundingBox(route: RouteModel): BoundingBox | null {
  if (!route.available) return null;

  let minLon = Infinity,
    maxLon = -Infinity,
    minLat = Infinity,
    maxLat = -Infinity;
  for (const p of route.points) {
    if (p.longitude < minLon) minLon = p.longitude;
    if (p.longitude > maxLon) maxLon = p.longitude;
    if (p.latitude < minLat) minLat = p.latitude;
    if (p.latitude > maxLat) maxLat = p.latitude;
  }
  return { minLon, minLat, maxLon, maxLat };
}

/**
 * Tolerance (in degrees) for a target resolution in metres, scaled to the
 * latitude of the course so long east‑west courses are not over‑simplified.
 * Never more than 0.01° (≈ 1 km).
 */
export function toleranceForResolution(
  bbox: BoundingBox,
  targetMeters: number
): number {
  const centerLat = (bbox.minLat + bbox.maxLat) / 2;
  const metersPerDegreeLat = 111_132;
  const metersPerDegreeLon = 111_320 * Math.cos((centerLat * Math.PI) / 180);
  const metersPerDegree = Math.min(metersPerDegreeLat, metersPerDegreeLon);

  return Math.min(targetMeters / metersPerDegree, 0.01);
}

/**
 * Course coordinates at the requested resolution. If simplification would
 * leave only the two end points the full list is returned instead.
 */
export function simplifyCourse(route: RouteModel, resolution: Resolution): Position[] {
  const coords: Position[] = route.points.map((p) => [
    p.longitude,
    p.latitude,
    p.elevation,
  ]);
  const bbox = routeBoundingBox(route);
  if (resolution === "full" || !bbox || coords.length <= 2) return coords;

  const tolerance = toleranceForResolution(bbox, TARGET_METERS[resolution]);
  // simplify-js returns the input objects it keeps; map them back to the
  // full positions so elevation survives
  const input = coords.map(([lon, lat]) => ({ x: lon, y: lat }));
  const indexOf = new Map(input.map((pt, i) => [pt, i]));
  const result = simplify(input, tolerance, false).flatMap((pt) => {
    const i = indexOf.get(pt);
    return i === undefined ? [] : [coords[i]];
  });

  return result.length > 2 ? result : coords;
}

export function courseFeatureCollection(
  route: RouteModel,
  resolution: Resolution
): CourseFeatureCollection {
  return {
    type: "FeatureCollection",
    features: [
      {
        type: "Feature",
        properties: {
          resolution,
          totalDistance: route.totalDistance,
          unit: route.unit,
          totalGain: Math.round(route.totalGain),
        },
        geometry: { type: "LineString", coordinates: simplifyCourse(route, resolution) },
      },
    ],
  };
}
