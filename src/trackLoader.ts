/*********************************************************************
 * src/trackLoader.ts
 *
 * Reads the course file from local storage and turns it into raw samples.
 *
 * Two formats are understood:
 *   - GPX 1.0/1.1: `<trkpt lat=".." lon="..">` with an optional `<ele>`
 *     (falls back to `<rtept>` for route‑only files)
 *   - RideWithGPS JSON export: `{ trip|route: { track_points: [{x, y, e}] } }`
 *     where x = lon, y = lat, e = elevation; a bare `[lon, lat, ele?][]`
 *     array is accepted as well.
 *
 * Any failure surfaces as a RouteLoadError so the caller can report it
 * once and keep running without route‑relative features.
 *********************************************************************/

import { promises as fs } from "fs";
import * as path from "path";
import { RouteModel } from "./routeModel.ts";
import { isValidCoordinate } from "./geo.ts";
import type { DistanceUnit, RawTrackSample } from "./types.ts";

export class RouteLoadError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RouteLoadError";
  }
}

/* --------------------------------------------------------------
 *  GPX
 * -------------------------------------------------------------- */

const POINT_PATTERN = {
  trkpt: /<trkpt\b([^>]*?)(?:\/>|>([\s\S]*?)<\/trkpt>)/gi,
  rtept: /<rtept\b([^>]*?)(?:\/>|>([\s\S]*?)<\/rtept>)/gi,
};
const ELE_PATTERN = /<ele>\s*([^<]+?)\s*<\/ele>/i;

function readAttribute(attrs: string, name: string): number {
  const match = new RegExp(`\\b${name}\\s*=\\s*["']([^"']+)["']`, "i").exec(attrs);
  return match ? Number(match[1]) : NaN;
}

function collectGpxPoints(xml: string, pattern: RegExp): RawTrackSample[] {
  const samples: RawTrackSample[] = [];
  for (const match of xml.matchAll(pattern)) {
    const attrs = match[1];
    const body = match[2] ?? "";
    const latitude = readAttribute(attrs, "lat");
    const longitude = readAttribute(attrs, "lon");
    // Skip points we cannot place on the map
    if (!isValidCoordinate(latitude, longitude)) continue;

    const eleMatch = ELE_PATTERN.exec(body);
    const elevation = eleMatch ? Number(eleMatch[1]) : NaN;
    samples.push(
      Number.isFinite(elevation)
        ? { latitude, longitude, elevation }
        : { latitude, longitude }
    );
  }
  return samples;
}

export function parseGpx(xml: string, source = "<gpx>"): RawTrackSample[] {
  let samples = collectGpxPoints(xml, POINT_PATTERN.trkpt);
  if (samples.length === 0) samples = collectGpxPoints(xml, POINT_PATTERN.rtept);
  if (samples.length === 0) {
    throw new RouteLoadError(`No track points found in ${source}`, source);
  }
  return samples;
}

/* --------------------------------------------------------------
 *  RideWithGPS JSON
 * -------------------------------------------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractTrackPoints(payload: unknown): unknown[] | null {
  if (Array.isArray(payload)) return payload;
  if (!isRecord(payload)) return null;
  for (const key of ["trip", "route"]) {
    const inner = payload[key];
    if (isRecord(inner) && Array.isArray(inner.track_points)) {
      return inner.track_points;
    }
  }
  return Array.isArray(payload.track_points) ? payload.track_points : null;
}

function toSample(pt: unknown): RawTrackSample | null {
  let lon: number;
  let lat: number;
  let ele: number;

  if (Array.isArray(pt) && pt.length >= 2) {
    // Pair form: [lon, lat, ele?]
    lon = Number(pt[0]);
    lat = Number(pt[1]);
    ele = pt.length >= 3 && pt[2] !== null ? Number(pt[2]) : NaN;
  } else if (isRecord(pt)) {
    // Object form: {x, y, e}
    lon = Number(pt.x);
    lat = Number(pt.y);
    ele = pt.e === undefined || pt.e === null ? NaN : Number(pt.e);
  } else {
    return null;
  }

  if (!isValidCoordinate(lat, lon)) return null;
  return Number.isFinite(ele)
    ? { latitude: lat, longitude: lon, elevation: ele }
    : { latitude: lat, longitude: lon };
}

export function parseRwgpsTrack(raw: string, source = "<json>"): RawTrackSample[] {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    throw new RouteLoadError(`Invalid JSON in ${source}`, source, { cause: err });
  }

  const trackPoints = extractTrackPoints(payload);
  if (!trackPoints) {
    throw new RouteLoadError(`${source} has no "track_points" array`, source);
  }

  const samples: RawTrackSample[] = [];
  for (const pt of trackPoints) {
    const sample = toSample(pt);
    if (sample) samples.push(sample);
  }
  if (samples.length === 0) {
    throw new RouteLoadError(`No usable track points in ${source}`, source);
  }
  return samples;
}

/* --------------------------------------------------------------
 *  File entry points
 * -------------------------------------------------------------- */

export async function loadTrackFile(filePath: string): Promise<RawTrackSample[]> {
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".gpx" && ext !== ".json") {
    throw new RouteLoadError(
      `Unsupported track format "${ext || "(none)"}" – expected .gpx or .json`,
      filePath
    );
  }

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new RouteLoadError(`Unable to read ${filePath}`, filePath, { cause: err });
  }

  const name = path.basename(filePath);
  return ext === ".gpx" ? parseGpx(raw, name) : parseRwgpsTrack(raw, name);
}

/**
 * Read the course file and build the model in one step. A file with fewer
 * than two usable points is rejected here rather than producing an empty
 * model silently.
 */
export async function buildRouteFromFile(
  filePath: string,
  unit: DistanceUnit
): Promise<RouteModel> {
  const samples = await loadTrackFile(filePath);
  if (samples.length < 2) {
    throw new RouteLoadError(
      `${path.basename(filePath)} has ${samples.length} usable point(s); at least 2 are needed`,
      filePath
    );
  }
  return RouteModel.fromSamples(samples, unit);
}
