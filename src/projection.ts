// src/projection.ts
import type { RouteModel } from "./routeModel.ts";
import type { WeatherProvider } from "./weather.ts";
import type {
  Coordinate,
  ElevationStats,
  Forecast,
  RiderSnapshot,
  RouteResult,
} from "./types.ts";

export const DEFAULT_LEAD_TIME_HOURS: readonly number[] = [1, 24];

export interface ProjectionOptions {
  /** Hours ahead at which to place forecast points */
  leadTimeHours?: readonly number[];
  featuredRiderId?: string | null;
  /** Leave out to skip weather lookups entirely */
  weather?: WeatherProvider;
}

export interface ForecastPoint {
  leadTimeHours: number;
  /** reportedDistance + reportedSpeed × leadTimeHours, not clamped */
  distance: number;
  /** True when the projection runs past the finish */
  beyondFinish: boolean;
  coordinate: Coordinate | null;
  forecast: Forecast | null;
}

export interface RiderPosition {
  coordinate: Coordinate;
  /** "reported" = the rider's own GPS fix, "route" = placed by distance */
  source: "reported" | "route";
}

export interface RiderProjection {
  rank: number;
  /** Leader's reported distance minus this rider's; 0 for the leader */
  gapToLeader: number;
  snapshot: RiderSnapshot;
  featured: boolean;
  position: RiderPosition | null;
  currentWeather: Forecast | null;
  gradientPercent: number | null;
  elevation: ElevationStats | null;
  forecastPoints: ForecastPoint[];
}

const valueOrNull = <T>(result: RouteResult<T>): T | null =>
  result.available ? result.value : null;

function resolvePosition(route: RouteModel, snapshot: RiderSnapshot): RiderPosition | null {
  if (snapshot.latitude !== null && snapshot.longitude !== null) {
    return {
      coordinate: { latitude: snapshot.latitude, longitude: snapshot.longitude },
      source: "reported",
    };
  }
  const onRoute = valueOrNull(route.coordinateAt(snapshot.reportedDistance));
  return onRoute ? { coordinate: onRoute, source: "route" } : null;
}

async function weatherAt(
  provider: WeatherProvider | undefined,
  coordinate: Coordinate | null,
  leadTimeHours: number
): Promise<Forecast | null> {
  if (!provider || !coordinate) return null;
  const forecast = await provider.forecastAt(
    coordinate.latitude,
    coordinate.longitude,
    leadTimeHours
  );
  return forecast ?? null;
}

/**
 * Everything the dashboard shows for one rider: where they are, what the
 * road does there, how much climbing is left, and where they will be (and
 * what the weather will be) after each lead time.
 */
export async function projectRider(
  route: RouteModel,
  snapshot: RiderSnapshot,
  options: ProjectionOptions = {},
  rank = 0,
  gapToLeader = 0
): Promise<RiderProjection> {
  const leadTimes = options.leadTimeHours ?? DEFAULT_LEAD_TIME_HOURS;
  const position = resolvePosition(route, snapshot);

  const pending = leadTimes.map(async (hours): Promise<ForecastPoint> => {
    const distance = snapshot.reportedDistance + snapshot.reportedSpeed * hours;
    const coordinate = valueOrNull(route.coordinateAt(distance));
    return {
      leadTimeHours: hours,
      distance,
      beyondFinish: route.available && distance > route.totalDistance,
      coordinate,
      forecast: await weatherAt(options.weather, coordinate, hours),
    };
  });

  const [currentWeather, forecastPoints] = await Promise.all([
    weatherAt(options.weather, position?.coordinate ?? null, 0),
    Promise.all(pending),
  ]);

  return {
    rank,
    gapToLeader,
    snapshot,
    featured:
      options.featuredRiderId != null && options.featuredRiderId === snapshot.riderId,
    position,
    currentWeather,
    gradientPercent: valueOrNull(route.gradientAt(snapshot.reportedDistance)),
    elevation: valueOrNull(route.elevationStats(snapshot.reportedDistance)),
    forecastPoints,
  };
}

/**
 * Project every rider, rank them by distance covered and give each one's
 * distance behind the leader.
 */
export async function projectStandings(
  route: RouteModel,
  snapshots: readonly RiderSnapshot[],
  options: ProjectionOptions = {}
): Promise<RiderProjection[]> {
  const ordered = [...snapshots].sort((a, b) => b.reportedDistance - a.reportedDistance);
  const leaderDistance = ordered.length > 0 ? ordered[0].reportedDistance : 0;
  return Promise.all(
    ordered.map((s, i) =>
      projectRider(route, s, options, i + 1, leaderDistance - s.reportedDistance)
    )
  );
}
