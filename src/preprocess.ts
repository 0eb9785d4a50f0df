/*********************************************************************
 * src/preprocess.ts
 *
 * Reads the course file named by COURSE_FILE, writes the three map
 * resolutions of it to ./processed/, and records a route summary in the
 * meta table of the tracker DB.
 *
 * Run with:
 *   npm run preprocess
 *
 * The server serves ./processed/ statically, so the dashboard can fetch
 * course_coarse.geojson etc. without going through the API.
 *********************************************************************/

import { promises as fs } from "fs";
import * as path from "path";
import { configFromEnvironment } from "./config.ts";
import { Db } from "./db.ts";
import { buildRouteFromFile } from "./trackLoader.ts";
import type { RouteModel } from "./routeModel.ts";
import {
  RESOLUTIONS,
  courseFeatureCollection,
  routeBoundingBox,
  type Resolution,
} from "./routeGeometry.ts";

/**
 * Write one resolution as a GeoJSON FeatureCollection. Returns the path
 * relative to the working directory.
 */
async function writeCourseGeoJSON(
  route: RouteModel,
  resolution: Resolution,
  outDir: string
): Promise<string> {
  const fc = courseFeatureCollection(route, resolution);
  const filePath = path.join(outDir, `course_${resolution}.geojson`);
  await fs.writeFile(filePath, JSON.stringify(fc), "utf8");
  console.log(
    `✅ ${path.basename(filePath)} – ${fc.features[0].geometry.coordinates.length} points`
  );
  return path.relative(process.cwd(), filePath);
}

async function main(): Promise<void> {
  const config = configFromEnvironment();
  console.log(`🔎 Reading course from ${config.courseFile}`);

  const route = await buildRouteFromFile(config.courseFile, config.distanceUnit);

  const processedDir = path.resolve("processed");
  await fs.mkdir(processedDir, { recursive: true });

  const written: Record<string, string> = {};
  for (const resolution of RESOLUTIONS) {
    written[resolution] = await writeCourseGeoJSON(route, resolution, processedDir);
  }

  const db = new Db(config.dbPath);
  db.setMeta(
    "route_summary",
    JSON.stringify({
      source: config.courseFile,
      unit: route.unit,
      totalDistance: Number(route.totalDistance.toFixed(2)),
      totalGain: Math.round(route.totalGain),
      pointCount: route.points.length,
      bbox: routeBoundingBox(route),
      files: written,
    })
  );
  db.setMeta("last_preprocess_ts", new Date().toISOString());
  db.close();

  console.log(
    `🎉 Course processed – ${route.totalDistance.toFixed(1)} ${route.unit}, ` +
      `${Math.round(route.totalGain)} m of climbing`
  );
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
