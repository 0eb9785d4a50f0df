import { describe, it, expect } from "vitest";
import { RouteModel } from "./routeModel.ts";
import type { RoutePoint, RouteResult } from "./types.ts";

function valueOf<T>(result: RouteResult<T>): T {
  if (!result.available) throw new Error(`unexpected ${result.reason}`);
  return result.value;
}

// Three samples: a 100 m climb over the first 10 units, a 50 m drop after
const threePoints: RoutePoint[] = [
  { cumulativeDistance: 0, latitude: 0, longitude: 0, elevation: 0 },
  { cumulativeDistance: 10, latitude: 1, longitude: 1, elevation: 100 },
  { cumulativeDistance: 20, latitude: 2, longitude: 2, elevation: 50 },
];

describe("RouteModel.fromSamples", () => {
  const samples = [
    { latitude: 0, longitude: 0, elevation: 10 },
    { latitude: 0, longitude: 1, elevation: 20 },
    { latitude: 0, longitude: 1, elevation: 20 },
    { latitude: 0, longitude: 2, elevation: 5 },
  ];

  it("sums great-circle distances into cumulative distance", () => {
    const route = RouteModel.fromSamples(samples, "km");
    const distances = route.points.map((p) => p.cumulativeDistance);

    expect(distances[0]).toBe(0);
    expect(distances[1]).toBeCloseTo(111.195, 3);
    expect(distances[2]).toBe(distances[1]);
    expect(distances[3]).toBeCloseTo(222.390, 3);
    for (let i = 1; i < distances.length; i++) {
      expect(distances[i]).toBeGreaterThanOrEqual(distances[i - 1]);
    }
    expect(route.totalDistance).toBe(distances[3]);
  });

  it("uses the requested unit", () => {
    const route = RouteModel.fromSamples(samples, "mi");
    expect(route.unit).toBe("mi");
    expect(route.totalDistance).toBeCloseTo(138.187, 3);
  });

  it("keeps elevation and accumulates ascent only", () => {
    const route = RouteModel.fromSamples(samples, "km");
    expect(route.points.map((p) => p.elevation)).toEqual([10, 20, 20, 5]);
    expect(route.totalGain).toBe(10);
    expect(route.hasElevation).toBe(true);
  });

  it("freezes the point sequence", () => {
    const route = RouteModel.fromSamples(samples, "km");
    expect(Object.isFrozen(route.points)).toBe(true);
    expect(Object.isFrozen(route.points[0])).toBe(true);
  });

  it("treats fewer than two samples as an unavailable route", () => {
    for (const input of [[], [samples[0]]]) {
      const route = RouteModel.fromSamples(input, "km");
      expect(route.available).toBe(false);
      expect(route.totalDistance).toBe(0);
      expect(route.coordinateAt(0)).toEqual({ available: false, reason: "route-unavailable" });
      expect(route.gradientAt(0)).toEqual({ available: false, reason: "route-unavailable" });
      expect(route.elevationStats(0)).toEqual({ available: false, reason: "route-unavailable" });
    }
  });

  it("reports elevation queries as unavailable when the track has no elevation", () => {
    const route = RouteModel.fromSamples(
      [
        { latitude: 0, longitude: 0 },
        { latitude: 0, longitude: 1 },
      ],
      "km"
    );
    expect(route.hasElevation).toBe(false);
    expect(route.coordinateAt(10).available).toBe(true);
    expect(route.gradientAt(10)).toEqual({ available: false, reason: "elevation-unavailable" });
    expect(route.elevationStats(10)).toEqual({ available: false, reason: "elevation-unavailable" });
  });

  it("interpolates a missing elevation between known samples", () => {
    const flat = RouteModel.fromSamples(
      [
        { latitude: 0, longitude: 0, elevation: 100 },
        { latitude: 0, longitude: 0.01 },
        { latitude: 0, longitude: 0.02, elevation: 100 },
      ],
      "km"
    );
    expect(flat.points.map((p) => p.elevation)).toEqual([100, 100, 100]);
    expect(flat.totalGain).toBe(0);
    expect(valueOf(flat.gradientAt(0.5))).toBe(0);

    const climb = RouteModel.fromSamples(
      [
        { latitude: 0, longitude: 0, elevation: 100 },
        { latitude: 0, longitude: 0.01 },
        { latitude: 0, longitude: 0.02 },
        { latitude: 0, longitude: 0.03, elevation: 130 },
      ],
      "km"
    );
    expect(climb.points[1].elevation).toBeCloseTo(110, 6);
    expect(climb.points[2].elevation).toBeCloseTo(120, 6);
    expect(climb.totalGain).toBeCloseTo(30, 6);
  });

  it("extends the nearest known elevation over missing ones at either end", () => {
    const route = RouteModel.fromSamples(
      [
        { latitude: 0, longitude: 0 },
        { latitude: 0, longitude: 0.01, elevation: 50 },
        { latitude: 0, longitude: 0.02 },
      ],
      "km"
    );
    expect(route.points.map((p) => p.elevation)).toEqual([50, 50, 50]);
    expect(route.hasElevation).toBe(true);
  });
});

describe("RouteModel.fromPoints", () => {
  it("requires the first point at distance 0", () => {
    expect(() =>
      RouteModel.fromPoints(
        [
          { cumulativeDistance: 5, latitude: 0, longitude: 0, elevation: 0 },
          { cumulativeDistance: 15, latitude: 1, longitude: 1, elevation: 0 },
        ],
        "km"
      )
    ).toThrow(new RangeError("First point has distance 5, expected 0"));
  });

  it("marks the profile as missing when told so", () => {
    const route = RouteModel.fromPoints(threePoints, "km", false);
    expect(route.hasElevation).toBe(false);
    expect(route.gradientAt(5)).toEqual({ available: false, reason: "elevation-unavailable" });
  });

  it("rejects decreasing distances", () => {
    expect(() =>
      RouteModel.fromPoints(
        [
          { cumulativeDistance: 0, latitude: 0, longitude: 0, elevation: 0 },
          { cumulativeDistance: 5, latitude: 0, longitude: 0, elevation: 0 },
          { cumulativeDistance: 4, latitude: 0, longitude: 0, elevation: 0 },
        ],
        "km"
      )
    ).toThrow(RangeError);
  });

  it("does not keep a reference to the caller's points", () => {
    const points = threePoints.map((p) => ({ ...p }));
    const route = RouteModel.fromPoints(points, "km");
    points[1].latitude = 99;
    expect(valueOf(route.coordinateAt(10))).toEqual({ latitude: 1, longitude: 1 });
  });
});

describe("coordinateAt", () => {
  const route = RouteModel.fromPoints(threePoints, "km");

  it("interpolates lat and lon linearly between samples", () => {
    expect(valueOf(route.coordinateAt(5))).toEqual({ latitude: 0.5, longitude: 0.5 });
    expect(valueOf(route.coordinateAt(15))).toEqual({ latitude: 1.5, longitude: 1.5 });
  });

  it("returns sample coordinates exactly at sample distances", () => {
    for (const p of route.points) {
      expect(valueOf(route.coordinateAt(p.cumulativeDistance))).toEqual({
        latitude: p.latitude,
        longitude: p.longitude,
      });
    }
  });

  it("clamps to the start and to the finish", () => {
    expect(valueOf(route.coordinateAt(0))).toEqual({ latitude: 0, longitude: 0 });
    expect(valueOf(route.coordinateAt(-3))).toEqual({ latitude: 0, longitude: 0 });
    expect(valueOf(route.coordinateAt(20))).toEqual({ latitude: 2, longitude: 2 });
    expect(valueOf(route.coordinateAt(20.5))).toEqual({ latitude: 2, longitude: 2 });
    expect(valueOf(route.coordinateAt(Infinity))).toEqual({ latitude: 2, longitude: 2 });
  });

  it("rejects NaN", () => {
    expect(route.coordinateAt(NaN)).toEqual({ available: false, reason: "invalid-distance" });
  });
});

describe("gradientAt", () => {
  it("is positive on a climb and negative on a descent", () => {
    const route = RouteModel.fromPoints(threePoints, "km");
    expect(valueOf(route.gradientAt(5))).toBeCloseTo(1, 10);
    expect(valueOf(route.gradientAt(15))).toBeCloseTo(-0.5, 10);
  });

  it("converts miles to metres for the horizontal run", () => {
    const route = RouteModel.fromPoints(threePoints, "mi");
    expect(valueOf(route.gradientAt(5))).toBeCloseTo(0.621371, 5);
  });

  it("measures the segment that starts at a sample", () => {
    const route = RouteModel.fromPoints(threePoints, "km");
    expect(valueOf(route.gradientAt(0))).toBeCloseTo(1, 10);
    expect(valueOf(route.gradientAt(10))).toBeCloseTo(-0.5, 10);
    expect(valueOf(route.gradientAt(-1))).toBeCloseTo(1, 10);
  });

  it("reports 0 at and beyond the finish", () => {
    const route = RouteModel.fromPoints(threePoints, "km");
    expect(valueOf(route.gradientAt(20))).toBe(0);
    expect(valueOf(route.gradientAt(500))).toBe(0);
  });
});

describe("elevationStats", () => {
  const route = RouteModel.fromPoints(threePoints, "km");

  it("counts ascent up to the distance and leaves descents out", () => {
    expect(valueOf(route.elevationStats(0))).toEqual({ climbed: 0, remaining: 100 });
    expect(valueOf(route.elevationStats(5))).toEqual({ climbed: 0, remaining: 100 });
    expect(valueOf(route.elevationStats(10))).toEqual({ climbed: 100, remaining: 0 });
    expect(valueOf(route.elevationStats(20))).toEqual({ climbed: 100, remaining: 0 });
    expect(valueOf(route.elevationStats(35))).toEqual({ climbed: 100, remaining: 0 });
    expect(valueOf(route.elevationStats(-4))).toEqual({ climbed: 0, remaining: 100 });
  });

  it("keeps climbed + remaining constant along a rolling course", () => {
    const rolling = RouteModel.fromPoints(
      [0, 40.4, 12.2, 88.9, 60, 60, 130.3, 20].map((elevation, i) => ({
        cumulativeDistance: i * 3,
        latitude: 45 + i * 0.01,
        longitude: 7,
        elevation,
      })),
      "km"
    );
    const atFinish = valueOf(rolling.elevationStats(rolling.totalDistance));
    expect(atFinish.remaining).toBe(0);

    for (const d of [0, 1.5, 3, 4, 9, 10.7, 15, 18, 20.9, 21]) {
      const { climbed, remaining } = valueOf(rolling.elevationStats(d));
      expect(climbed + remaining).toBe(atFinish.climbed);
    }
  });
});

describe("degenerate segments", () => {
  const route = RouteModel.fromPoints(
    [
      { cumulativeDistance: 0, latitude: 0, longitude: 0, elevation: 0 },
      { cumulativeDistance: 5, latitude: 0.5, longitude: 0.5, elevation: 20 },
      { cumulativeDistance: 5, latitude: 0.6, longitude: 0.6, elevation: 30 },
      { cumulativeDistance: 10, latitude: 1, longitude: 1, elevation: 30 },
      { cumulativeDistance: 10, latitude: 1, longitude: 1, elevation: 40 },
    ],
    "km"
  );

  it("answers every query around duplicate distances with finite values", () => {
    for (const d of [4.999, 5, 5.001, 9.999, 10, 10.001]) {
      const coord = valueOf(route.coordinateAt(d));
      expect(Number.isFinite(coord.latitude)).toBe(true);
      expect(Number.isFinite(coord.longitude)).toBe(true);
      expect(Number.isFinite(valueOf(route.gradientAt(d)))).toBe(true);
    }
  });

  it("lands on the later of two samples sharing a distance", () => {
    expect(valueOf(route.coordinateAt(5))).toEqual({ latitude: 0.6, longitude: 0.6 });
    expect(valueOf(route.gradientAt(5))).toBe(0);
  });
});
