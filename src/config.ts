// src/config.ts
import dotenv from "dotenv";
import { z } from "zod";
import type { DistanceUnit } from "./types.ts";

export interface AppConfig {
  port: number;
  courseFile: string;
  distanceUnit: DistanceUnit;
  dbPath: string;
  featuredRiderId: string | null;
  weatherEnabled: boolean;
  forecastHours: number[];
  routeLoadRetries: number;
  routeLoadRetryDelayMs: number;
}

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const hoursList = z
  .string()
  .transform((v) => v.split(",").map((h) => h.trim()).filter(Boolean).map(Number))
  .pipe(z.array(z.number().finite().nonnegative()).min(1));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  COURSE_FILE: z.string().min(1).default("course.gpx"),
  DISTANCE_UNIT: z.enum(["mi", "km"]).default("mi"),
  DB_PATH: z.string().min(1).default("tracker.db"),
  FEATURED_RIDER_ID: z.string().trim().optional(),
  WEATHER_ENABLED: flag.default("true"),
  FORECAST_HOURS: hoursList.default("1,24"),
  ROUTE_LOAD_RETRIES: z.coerce.number().int().min(0).default(2),
  ROUTE_LOAD_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
});

/**
 * Read the configuration from an environment map. Empty strings count as
 * "not set". Throws naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration – ${details}`);
  }

  const e = result.data;
  return {
    port: e.PORT,
    courseFile: e.COURSE_FILE,
    distanceUnit: e.DISTANCE_UNIT,
    dbPath: e.DB_PATH,
    featuredRiderId: e.FEATURED_RIDER_ID || null,
    weatherEnabled: e.WEATHER_ENABLED,
    forecastHours: e.FORECAST_HOURS,
    routeLoadRetries: e.ROUTE_LOAD_RETRIES,
    routeLoadRetryDelayMs: e.ROUTE_LOAD_RETRY_DELAY_MS,
  };
}

/** Load `.env` into process.env (existing variables win) and parse it. */
export function configFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
