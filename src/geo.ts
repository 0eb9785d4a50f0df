// src/geo.ts
import type { Coordinate, DistanceUnit } from "./types.ts";

/** Mean earth radius (IUGG) in kilometres. */
const EARTH_RADIUS_KM = 6371.0088;

export const METERS_PER_UNIT: Record<DistanceUnit, number> = {
  km: 1000,
  mi: 1609.344,
};

const deg2rad = (deg: number): number => deg * (Math.PI / 180);

/**
 * Great‑circle (haversine) distance between two coordinates, in `unit`.
 */
export function haversineDistance(
  a: Coordinate,
  b: Coordinate,
  unit: DistanceUnit
): number {
  const dLat = deg2rad(b.latitude - a.latitude);
  const dLon = deg2rad(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(deg2rad(a.latitude)) *
      Math.cos(deg2rad(b.latitude)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  const meters = EARTH_RADIUS_KM * 1000 * c;
  return meters / METERS_PER_UNIT[unit];
}

export function toMeters(distance: number, unit: DistanceUnit): number {
  return distance * METERS_PER_UNIT[unit];
}

const CARDINALS = [
  "N", "NNE", "NE", "ENE", "E", "ESE", "SE", "SSE",
  "S", "SSW", "SW", "WSW", "W", "WNW", "NW", "NNW",
] as const;

/** Wind direction in degrees → 16‑point compass label. */
export function degreesToCardinal(deg: number): string {
  const normalized = ((deg % 360) + 360) % 360;
  const ix = Math.floor((normalized + 11.25) / 22.5) % 16;
  return CARDINALS[ix];
}

export function isValidCoordinate(lat: number, lon: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lon) &&
    lat >= -90 &&
    lat <= 90 &&
    lon >= -180 &&
    lon <= 180
  );
}
