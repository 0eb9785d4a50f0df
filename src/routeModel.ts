/*********************************************************************
 * src/routeModel.ts
 *
 * Distance‑indexed model of the race course.
 *
 * Built once from the raw track samples: every sample gets the summed
 * great‑circle distance from the start, and a prefix table of ascent is
 * precomputed so elevation queries are a binary search away.
 *
 * Usage:
 *   const route = RouteModel.fromSamples(samples, "mi");
 *   route.coordinateAt(1234.5);   // { available: true, value: {...} }
 *   route.gradientAt(1234.5);     // signed percent
 *   route.elevationStats(1234.5); // { climbed, remaining } in metres
 *
 * Instances are never mutated after construction; a corrected track means
 * a new instance (see routeStore.ts).
 *********************************************************************/

import { haversineDistance, toMeters } from "./geo.ts";
import type {
  Coordinate,
  DistanceUnit,
  ElevationStats,
  RawTrackSample,
  RouteResult,
  RoutePoint,
  RouteUnavailableReason,
} from "./types.ts";

const unavailable = <T>(reason: RouteUnavailableReason): RouteResult<T> => ({
  available: false,
  reason,
});

const ok = <T>(value: T): RouteResult<T> => ({ available: true, value });

export class RouteModel {
  readonly points: readonly RoutePoint[];
  readonly totalDistance: number;
  readonly totalGain: number;
  /** False when no sample of the source carried an elevation */
  readonly hasElevation: boolean;

  /** ascentPrefix[i] = metres climbed between point 0 and point i */
  private readonly ascentPrefix: readonly number[];

  private constructor(
    points: RoutePoint[],
    readonly unit: DistanceUnit,
    hasElevation: boolean
  ) {
    const prefix: number[] = [];
    let gain = 0;
    points.forEach((p, i) => {
      if (i > 0) {
        const diff = p.elevation - points[i - 1].elevation;
        if (diff > 0) gain += diff;
      }
      prefix.push(gain);
    });

    this.points = Object.freeze(points.map((p) => Object.freeze(p)));
    this.ascentPrefix = Object.freeze(prefix);
    this.totalGain = gain;
    this.totalDistance =
      points.length > 0 ? points[points.length - 1].cumulativeDistance : 0;
    this.hasElevation = hasElevation;
  }

  /**
   * Build the model from ordered raw samples. With fewer than two samples
   * the result is an empty model on which every query reports
   * `route-unavailable`.
   */
  static fromSamples(
    samples: readonly RawTrackSample[],
    unit: DistanceUnit
  ): RouteModel {
    if (samples.length < 2) return RouteModel.empty(unit);

    const distances: number[] = [];
    let cumulative = 0;
    samples.forEach((s, i) => {
      if (i > 0) cumulative += haversineDistance(samples[i - 1], s, unit);
      distances.push(cumulative);
    });

    const hasElevation = samples.some((s) => s.elevation !== undefined);
    const elevations = hasElevation
      ? fillElevations(samples, distances)
      : samples.map(() => 0);

    const points = samples.map((s, i) => ({
      cumulativeDistance: distances[i],
      latitude: s.latitude,
      longitude: s.longitude,
      elevation: elevations[i],
    }));
    return RouteModel.fromPoints(points, unit, hasElevation);
  }

  /**
   * Build the model from points whose distances are already known. The first
   * point must sit at distance 0 and later ones may not go backwards; a
   * RangeError is thrown otherwise.
   */
  static fromPoints(
    points: readonly RoutePoint[],
    unit: DistanceUnit,
    hasElevation = true
  ): RouteModel {
    if (points.length < 2) return RouteModel.empty(unit);
    if (points[0].cumulativeDistance !== 0) {
      throw new RangeError(
        `First point has distance ${points[0].cumulativeDistance}, expected 0`
      );
    }
    points.forEach((p, i) => {
      const prev = i > 0 ? points[i - 1].cumulativeDistance : 0;
      if (!(p.cumulativeDistance >= prev)) {
        throw new RangeError(
          `Point ${i} has distance ${p.cumulativeDistance}, expected >= ${prev}`
        );
      }
    });
    return new RouteModel(points.map((p) => ({ ...p })), unit, hasElevation);
  }

  static empty(unit: DistanceUnit): RouteModel {
    return new RouteModel([], unit, false);
  }

  get available(): boolean {
    return this.points.length >= 2;
  }

  /**
   * Interpolated coordinate at `distance`. Negative distances clamp to the
   * start, distances at or past the finish return the last sample as is.
   */
  coordinateAt(distance: number): RouteResult<Coordinate> {
    if (!this.available) return unavailable("route-unavailable");
    if (Number.isNaN(distance)) return unavailable("invalid-distance");

    if (distance >= this.totalDistance) {
      return ok(toCoordinate(this.points[this.points.length - 1]));
    }
    if (distance <= 0) return ok(toCoordinate(this.points[0]));

    const i = this.indexAtOrBefore(distance);
    const p1 = this.points[i];
    const p2 = this.points[i + 1];
    const span = p2.cumulativeDistance - p1.cumulativeDistance;
    const ratio = span === 0 ? 0 : (distance - p1.cumulativeDistance) / span;

    return ok({
      latitude: p1.latitude + (p2.latitude - p1.latitude) * ratio,
      longitude: p1.longitude + (p2.longitude - p1.longitude) * ratio,
    });
  }

  /**
   * Signed slope (percent, positive = climbing) of the segment containing
   * `distance`. A zero‑length segment and the finish both report 0.
   */
  gradientAt(distance: number): RouteResult<number> {
    if (!this.available) return unavailable("route-unavailable");
    if (!this.hasElevation) return unavailable("elevation-unavailable");
    if (Number.isNaN(distance)) return unavailable("invalid-distance");
    if (distance >= this.totalDistance) return ok(0);

    const i = distance <= 0 ? 0 : this.indexAtOrBefore(distance);
    const p1 = this.points[i];
    const p2 = this.points[i + 1];
    const horizontalMeters = toMeters(
      p2.cumulativeDistance - p1.cumulativeDistance,
      this.unit
    );
    if (horizontalMeters === 0) return ok(0);

    return ok(((p2.elevation - p1.elevation) / horizontalMeters) * 100);
  }

  /**
   * Ascent already covered and still ahead at `distance`, in whole metres.
   * Descents never reduce `climbed`; `climbed + remaining` is constant.
   */
  elevationStats(distance: number): RouteResult<ElevationStats> {
    if (!this.available) return unavailable("route-unavailable");
    if (!this.hasElevation) return unavailable("elevation-unavailable");
    if (Number.isNaN(distance)) return unavailable("invalid-distance");

    const total = Math.round(this.totalGain);
    if (distance < 0) return ok({ climbed: 0, remaining: total });

    const climbed = Math.round(this.ascentPrefix[this.indexAtOrBefore(distance)]);
    return ok({ climbed, remaining: total - climbed });
  }

  /**
   * Last index whose cumulative distance is <= `distance`. Never the final
   * index while `distance < totalDistance`.
   */
  private indexAtOrBefore(distance: number): number {
    let lo = 0;
    let hi = this.points.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.points[mid].cumulativeDistance <= distance) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }
}

/**
 * Elevation for every sample: gaps between two known samples are
 * interpolated by distance, gaps at either end take the nearest known value.
 * Expects at least one sample with an elevation.
 */
function fillElevations(
  samples: readonly RawTrackSample[],
  distances: readonly number[]
): number[] {
  const known: number[] = [];
  samples.forEach((s, i) => {
    if (s.elevation !== undefined) known.push(i);
  });

  let k = 0;
  return samples.map((s, i) => {
    if (s.elevation !== undefined) return s.elevation;
    while (k < known.length && known[k] < i) k++;
    const before = k > 0 ? known[k - 1] : undefined;
    const after = k < known.length ? known[k] : undefined;
    const eleAt = (j: number) => samples[j].elevation ?? 0;

    if (before === undefined) return after === undefined ? 0 : eleAt(after);
    if (after === undefined) return eleAt(before);

    const span = distances[after] - distances[before];
    const ratio = span === 0 ? 0 : (distances[i] - distances[before]) / span;
    return eleAt(before) + (eleAt(after) - eleAt(before)) * ratio;
  });
}

function toCoordinate(p: RoutePoint): Coordinate {
  return { latitude: p.latitude, longitude: p.longitude };
}
