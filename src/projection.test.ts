import { describe, it, expect, vi } from "vitest";
import { RouteModel } from "./routeModel.ts";
import { projectRider, projectStandings } from "./projection.ts";
import { OpenMeteoProvider, type WeatherProvider } from "./weather.ts";
import type { Forecast, RiderSnapshot } from "./types.ts";

const route = RouteModel.fromPoints(
  [
    { cumulativeDistance: 0, latitude: 0, longitude: 0, elevation: 0 },
    { cumulativeDistance: 10, latitude: 1, longitude: 1, elevation: 100 },
    { cumulativeDistance: 20, latitude: 2, longitude: 2, elevation: 50 },
  ],
  "km"
);

const snapshot = (overrides: Partial<RiderSnapshot> = {}): RiderSnapshot => ({
  riderId: "101",
  name: "Test Rider",
  reportedDistance: 5,
  reportedSpeed: 2,
  latitude: null,
  longitude: null,
  reportedAt: "2025-06-18T14:00:00.000Z",
  ...overrides,
});

// Encodes the lead time in the temperature so each point is identifiable
function stubWeather() {
  const forecastAt = vi.fn(
    async (_lat: number, _lon: number, leadTimeHours: number): Promise<Forecast | undefined> => ({
      time: "2025-06-18T14:00:00.000Z",
      temperatureC: leadTimeHours,
      relativeHumidity: 40,
      precipitationMm: 0,
      windSpeedKmh: 12,
      windDirectionDeg: 270,
      windCardinal: "W",
    })
  );
  const provider: WeatherProvider = { forecastAt };
  return { provider, forecastAt };
}

describe("projectRider", () => {
  it("places the rider by distance when the feed has no GPS", async () => {
    const p = await projectRider(route, snapshot());

    expect(p.position).toEqual({ coordinate: { latitude: 0.5, longitude: 0.5 }, source: "route" });
    expect(p.gradientPercent).toBeCloseTo(1, 10);
    expect(p.elevation).toEqual({ climbed: 0, remaining: 100 });
    expect(p.currentWeather).toBeNull();
  });

  it("prefers the reported GPS fix", async () => {
    const p = await projectRider(route, snapshot({ latitude: 0.51, longitude: 0.49 }));
    expect(p.position).toEqual({ coordinate: { latitude: 0.51, longitude: 0.49 }, source: "reported" });
  });

  it("projects 1 h and 24 h ahead and clamps at the finish", async () => {
    const p = await projectRider(route, snapshot());

    expect(p.forecastPoints).toEqual([
      {
        leadTimeHours: 1,
        distance: 7,
        beyondFinish: false,
        coordinate: { latitude: 0.7, longitude: 0.7 },
        forecast: null,
      },
      {
        leadTimeHours: 24,
        distance: 53,
        beyondFinish: true,
        coordinate: { latitude: 2, longitude: 2 },
        forecast: null,
      },
    ]);
  });

  it("asks the weather provider at the current and projected positions", async () => {
    const { provider, forecastAt } = stubWeather();
    const p = await projectRider(route, snapshot(), { weather: provider, leadTimeHours: [1, 24] });

    expect(forecastAt).toHaveBeenCalledTimes(3);
    expect(forecastAt).toHaveBeenCalledWith(0.5, 0.5, 0);
    expect(forecastAt).toHaveBeenCalledWith(0.7, 0.7, 1);
    expect(forecastAt).toHaveBeenCalledWith(2, 2, 24);
    expect(p.currentWeather?.temperatureC).toBe(0);
    expect(p.forecastPoints.map((f) => f.forecast?.temperatureC)).toEqual([1, 24]);
  });

  it("turns a missing forecast into null", async () => {
    const provider: WeatherProvider = { forecastAt: async () => undefined };
    const p = await projectRider(route, snapshot(), { weather: provider });
    expect(p.currentWeather).toBeNull();
    expect(p.forecastPoints.every((f) => f.forecast === null)).toBe(true);
  });

  it("degrades to nulls without a route", async () => {
    const { provider, forecastAt } = stubWeather();
    const p = await projectRider(RouteModel.empty("km"), snapshot(), { weather: provider });

    expect(p.position).toBeNull();
    expect(p.gradientPercent).toBeNull();
    expect(p.elevation).toBeNull();
    expect(p.forecastPoints.map((f) => [f.distance, f.coordinate, f.beyondFinish])).toEqual([
      [7, null, false],
      [53, null, false],
    ]);
    expect(forecastAt).not.toHaveBeenCalled();
  });

  it("still reports weather at the rider's own fix without a route", async () => {
    const { provider, forecastAt } = stubWeather();
    const p = await projectRider(
      RouteModel.empty("km"),
      snapshot({ latitude: 38.6, longitude: -90.2 }),
      { weather: provider }
    );
    expect(forecastAt).toHaveBeenCalledTimes(1);
    expect(forecastAt).toHaveBeenCalledWith(38.6, -90.2, 0);
    expect(p.currentWeather?.windCardinal).toBe("W");
  });

  it("flags the featured rider", async () => {
    const featured = await projectRider(route, snapshot(), { featuredRiderId: "101" });
    const other = await projectRider(route, snapshot({ riderId: "102" }), { featuredRiderId: "101" });
    const nobody = await projectRider(route, snapshot(), {});
    expect([featured.featured, other.featured, nobody.featured]).toEqual([true, false, false]);
  });

  it("leaves a lone rider with no gap", async () => {
    const p = await projectRider(route, snapshot());
    expect([p.rank, p.gapToLeader]).toEqual([0, 0]);
  });
});

describe("projectStandings", () => {
  it("ranks riders by distance covered and gives the gap to the leader", async () => {
    const standings = await projectStandings(route, [
      snapshot({ riderId: "a", reportedDistance: 3 }),
      snapshot({ riderId: "b", reportedDistance: 12 }),
      snapshot({ riderId: "c", reportedDistance: 8 }),
    ]);
    expect(standings.map((s) => [s.rank, s.snapshot.riderId, s.gapToLeader])).toEqual([
      [1, "b", 0],
      [2, "c", 4],
      [3, "a", 9],
    ]);
  });

  it("fetches the forecast once for riders bunched in one spot", async () => {
    const bunch = RouteModel.fromPoints(
      [0, 1000].map((cumulativeDistance) => ({
        cumulativeDistance,
        latitude: 38.5,
        longitude: -90.2,
        elevation: 150,
      })),
      "km"
    );
    const emptySeries = {
      time: [],
      temperature_2m: [],
      relative_humidity_2m: [],
      precipitation: [],
      wind_speed_10m: [],
      wind_direction_10m: [],
    };
    const fetchFn = vi.fn(async () => new Response(JSON.stringify({ hourly: emptySeries })));
    const weather = new OpenMeteoProvider({ fetchFn });

    const riders = Array.from({ length: 10 }, (_, i) =>
      snapshot({ riderId: String(i), reportedDistance: 100 + i, latitude: 38.5, longitude: -90.2 })
    );
    const standings = await projectStandings(bunch, riders, { weather });

    expect(standings).toHaveLength(10);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("returns nothing for an empty feed", async () => {
    await expect(projectStandings(route, [])).resolves.toEqual([]);
  });
});
