/*******************************************************************
 * src/app.ts – Express API over the route model and the rider store
 *
 * Endpoints
 * ----------
 * GET  /health
 * GET  /api/route                      summary (or "route data not loaded")
 * GET  /api/route/at?distance=         coordinate, gradient, elevation budget
 * GET  /api/route/geojson/:resolution  full | medium | coarse
 * GET  /api/riders                     standings with projections
 * GET  /api/riders/:id/history?hours=  position history (default 24 h)
 * POST /api/riders                     ingest raw feed records
 *
 * Static folder
 * --------------
 *   ./processed/  <-- course_full.geojson, course_medium.geojson,
 *                     course_coarse.geojson (written by preprocess.ts)
 ******************************************************************/

import express, { type Request, type Response } from "express";
import cors from "cors";
import path from "path";
import { z } from "zod";
import type { Db } from "./db.ts";
import type { RouteStore } from "./routeStore.ts";
import type { WeatherProvider } from "./weather.ts";
import type { RouteModel } from "./routeModel.ts";
import type { BoundingBox, Coordinate, ElevationStats, RouteUnavailableReason } from "./types.ts";
import { courseFeatureCollection, isResolution, routeBoundingBox } from "./routeGeometry.ts";
import { parseRiderFeed } from "./riderFeed.ts";
import { projectStandings } from "./projection.ts";

export const ROUTE_NOT_LOADED = "route data not loaded";

export interface AppDeps {
  routes: RouteStore;
  db: Db;
  weather?: WeatherProvider;
  featuredRiderId?: string | null;
  forecastHours?: readonly number[];
  processedDir?: string;
}

export interface RouteSummary {
  available: boolean;
  message?: string;
  unit: string;
  totalDistance: number;
  pointCount: number;
  totalGain: number;
  bbox: BoundingBox | null;
}

export interface RouteLookup {
  distance: number;
  coordinate: Coordinate | null;
  gradientPercent: number | null;
  elevation: ElevationStats | null;
}

// Empty strings would coerce to 0
const queryNumber = z.string().trim().min(1).pipe(z.coerce.number().finite());

const distanceQuery = z.object({
  distance: queryNumber,
});

const historyQuery = z.object({
  hours: queryNumber.pipe(z.number().positive().max(24 * 30)).default("24"),
});

const ingestBody = z.union([
  z.array(z.unknown()),
  z.object({ riders: z.array(z.unknown()) }).transform((b) => b.riders),
]);

// -----------------------------------------------------------------
// Pure helpers – the handlers below only translate these to HTTP
// -----------------------------------------------------------------
export function summarizeRoute(route: RouteModel): RouteSummary {
  return {
    available: route.available,
    ...(route.available ? {} : { message: ROUTE_NOT_LOADED }),
    unit: route.unit,
    totalDistance: route.totalDistance,
    pointCount: route.points.length,
    totalGain: Math.round(route.totalGain),
    bbox: routeBoundingBox(route),
  };
}

/**
 * Route queries at one distance. Returns the reason instead when the
 * coordinate itself cannot be answered; a missing elevation profile only
 * nulls the elevation fields.
 */
export function lookupDistance(
  route: RouteModel,
  distance: number
): RouteLookup | { reason: RouteUnavailableReason } {
  const coordinate = route.coordinateAt(distance);
  if (!coordinate.available) return { reason: coordinate.reason };

  const gradient = route.gradientAt(distance);
  const elevation = route.elevationStats(distance);
  return {
    distance,
    coordinate: coordinate.value,
    gradientPercent: gradient.available ? gradient.value : null,
    elevation: elevation.available ? elevation.value : null,
  };
}

function zodMessage(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const processedDir = deps.processedDir ?? path.resolve("processed");

  // Allow the front‑end (which may be served from another port) to call us
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => res.send("OK"));

  // -----------------------------------------------------------------
  // Route
  // -----------------------------------------------------------------
  app.get("/api/route", (_req: Request, res: Response) => {
    res.json(summarizeRoute(deps.routes.current));
  });

  app.get("/api/route/at", (req: Request, res: Response) => {
    const parsed = distanceQuery.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: zodMessage(parsed.error) });
      return;
    }
    const lookup = lookupDistance(deps.routes.current, parsed.data.distance);
    if ("reason" in lookup) {
      res.status(503).json({ error: ROUTE_NOT_LOADED, reason: lookup.reason });
      return;
    }
    res.json(lookup);
  });

  app.get("/api/route/geojson/:resolution", (req: Request, res: Response) => {
    const { resolution } = req.params;
    if (!isResolution(resolution)) {
      res.status(400).json({ error: "Invalid resolution" });
      return;
    }
    const route = deps.routes.current;
    if (!route.available) {
      res.status(503).json({ error: ROUTE_NOT_LOADED });
      return;
    }
    res.json(courseFeatureCollection(route, resolution));
  });

  // -----------------------------------------------------------------
  // Riders
  // -----------------------------------------------------------------
  app.get("/api/riders", async (_req: Request, res: Response) => {
    try {
      const standings = await projectStandings(
        deps.routes.current,
        deps.db.getLatestSnapshots(),
        {
          weather: deps.weather,
          featuredRiderId: deps.featuredRiderId ?? null,
          leadTimeHours: deps.forecastHours,
        }
      );
      res.json({ route: summarizeRoute(deps.routes.current), riders: standings });
    } catch (err) {
      console.error("❌ Failed to build standings:", err);
      res.status(500).json({ error: "Failed to build standings" });
    }
  });

  app.get("/api/riders/:id/history", (req: Request, res: Response) => {
    const parsed = historyQuery.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: zodMessage(parsed.error) });
      return;
    }
    const since = new Date(Date.now() - parsed.data.hours * 3_600_000).toISOString();
    res.json(deps.db.getRiderHistory(req.params.id, since));
  });

  app.post("/api/riders", (req: Request, res: Response) => {
    const parsed = ingestBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Expected an array of rider records" });
      return;
    }
    const { snapshots, skipped } = parseRiderFeed(parsed.data);
    const stored = deps.db.upsertSnapshots(snapshots);
    deps.db.setMeta("last_ingest_ts", new Date().toISOString());
    console.log(`✅ Ingested ${stored} snapshot(s), skipped ${skipped}`);
    res.json({ stored, skipped });
  });

  // -----------------------------------------------------------------
  // Serve the static processed GeoJSON folder
  // -----------------------------------------------------------------
  app.use("/processed", express.static(processedDir));

  return app;
}
