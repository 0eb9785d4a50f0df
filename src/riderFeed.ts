/*********************************************************************
 * src/riderFeed.ts
 *
 * Boundary parser for live rider records.
 *
 * The upstream feed has changed its field names several times during a
 * race (bib vs. bib_number, distance vs. distance_miles, lng vs. lon …),
 * so each field is looked up under all the names seen so far and the
 * result is validated against one fixed shape. A record missing a required
 * field is skipped and logged; nothing optional or sentinel‑valued gets
 * past this file.
 *********************************************************************/

import { z } from "zod";
import { isValidCoordinate } from "./geo.ts";
import type { RiderSnapshot } from "./types.ts";

/** Accepted names per field, in order of preference */
export const FIELD_ALIASES: Record<string, readonly string[]> = {
  riderId: ["riderId", "rider_id", "bib", "bib_number", "id"],
  name: ["name", "rider", "racer"],
  reportedDistance: ["distance", "distance_miles", "distance_km", "miles", "dist"],
  reportedSpeed: ["speed", "speed_mph", "speed_kmh", "mph"],
  latitude: ["lat", "latitude"],
  longitude: ["lon", "lng", "longitude"],
  reportedAt: ["reportedAt", "timestamp", "time"],
};

const numeric = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite());

const feedRecordSchema = z.object({
  riderId: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
  name: z.string().trim().min(1).nullish().catch(null),
  reportedDistance: numeric.pipe(z.number().nonnegative()),
  reportedSpeed: numeric.pipe(z.number().nonnegative()),
  latitude: numeric.nullish().catch(null),
  longitude: numeric.nullish().catch(null),
  reportedAt: z.union([z.string(), z.number()]).nullish().catch(null),
});

export type RecordParseResult =
  | { ok: true; snapshot: RiderSnapshot }
  | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickAliased(raw: Record<string, unknown>): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const [field, aliases] of Object.entries(FIELD_ALIASES)) {
    const key = aliases.find(
      (k) => raw[k] !== undefined && raw[k] !== null && raw[k] !== ""
    );
    if (key !== undefined) picked[field] = raw[key];
  }
  return picked;
}

function toIsoTimestamp(value: string | number | null | undefined, now: Date): string {
  if (value === null || value === undefined) return now.toISOString();
  // numbers are epoch seconds in every feed revision seen so far
  const date = typeof value === "number" ? new Date(value * 1000) : new Date(value);
  return Number.isNaN(date.getTime()) ? now.toISOString() : date.toISOString();
}

/**
 * Map one untrusted feed record onto a RiderSnapshot. Coordinates that are
 * missing, partial or out of range become `null` rather than rejecting the
 * record; the route can still place the rider by distance.
 */
export function parseRiderRecord(raw: unknown, now: Date = new Date()): RecordParseResult {
  if (!isRecord(raw)) {
    return { ok: false, error: "record is not an object" };
  }

  const result = feedRecordSchema.safeParse(pickAliased(raw));
  if (!result.success) {
    return {
      ok: false,
      error: result.error.issues
        .map((i) => `${i.path.join(".") || "record"}: ${i.message}`)
        .join("; "),
    };
  }

  const rec = result.data;
  const hasFix =
    typeof rec.latitude === "number" &&
    typeof rec.longitude === "number" &&
    isValidCoordinate(rec.latitude, rec.longitude);

  return {
    ok: true,
    snapshot: {
      riderId: rec.riderId,
      name: rec.name ?? null,
      reportedDistance: rec.reportedDistance,
      reportedSpeed: rec.reportedSpeed,
      latitude: hasFix ? rec.latitude ?? null : null,
      longitude: hasFix ? rec.longitude ?? null : null,
      reportedAt: toIsoTimestamp(rec.reportedAt, now),
    },
  };
}

export function parseRiderFeed(
  records: readonly unknown[],
  now: Date = new Date()
): { snapshots: RiderSnapshot[]; skipped: number } {
  const snapshots: RiderSnapshot[] = [];
  let skipped = 0;

  records.forEach((raw, index) => {
    const parsed = parseRiderRecord(raw, now);
    if (parsed.ok) {
      snapshots.push(parsed.snapshot);
    } else {
      skipped++;
      console.warn(`⚠️  Feed record #${index} skipped – ${parsed.error}`);
    }
  });

  return { snapshots, skipped };
}
