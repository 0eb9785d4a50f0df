/* src/types.ts ----------------------------------------------------------- */

/** Distance unit used consistently across one route model and its callers. */
export type DistanceUnit = "mi" | "km";

export interface BoundingBox {
  /** Westernmost longitude (‑180 → 180) */
  minLon: number;
  /** Southernmost latitude (‑90 → 90) */
  minLat: number;
  /** Easternmost longitude */
  maxLon: number;
  /** Northernmost latitude */
  maxLat: number;
}

export interface Coordinate {
  latitude: number;
  longitude: number;
}

/**
 * One sample as read from the course file, before any distance is derived.
 * `elevation` is left out when the source has no `<ele>` (or `e`) value.
 */
export interface RawTrackSample extends Coordinate {
  elevation?: number;
}

/** One sample of the course, indexed by distance from the start. */
export interface RoutePoint extends Coordinate {
  /** Along‑route distance from the start, in the model's unit */
  cumulativeDistance: number;
  /** Metres; 0 when the source sample carried none */
  elevation: number;
}

export interface ElevationStats {
  /** Whole metres of ascent up to the queried distance */
  climbed: number;
  /** Whole metres of ascent still ahead */
  remaining: number;
}

export type RouteUnavailableReason =
  | "route-unavailable"
  | "elevation-unavailable"
  | "invalid-distance";

/**
 * Answer of every route‑relative query. Queries never throw; an unloaded
 * route or a meaningless distance comes back as `available: false`.
 */
export type RouteResult<T> =
  | { available: true; value: T }
  | { available: false; reason: RouteUnavailableReason };

/**
 * A single live report for one rider, after the feed record has been
 * validated at the boundary (see riderFeed.ts).
 */
export interface RiderSnapshot {
  riderId: string;
  name: string | null;
  /** Distance covered, in the route's unit */
  reportedDistance: number;
  /** Route units per hour */
  reportedSpeed: number;
  latitude: number | null;
  longitude: number | null;
  /** ISO‑8601 */
  reportedAt: string;
}

/** Hourly conditions at one coordinate. */
export interface Forecast {
  /** ISO‑8601 (UTC) start of the hour the values apply to */
  time: string;
  temperatureC: number;
  relativeHumidity: number;
  precipitationMm: number;
  windSpeedKmh: number;
  windDirectionDeg: number;
  /** 16‑point compass label, e.g. "WSW" */
  windCardinal: string;
}
