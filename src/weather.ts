// src/weather.ts
import { z } from "zod";
import { degreesToCardinal } from "./geo.ts";
import type { Forecast } from "./types.ts";

/**
 * Anything that can tell the conditions at a coordinate some hours ahead.
 * Implementations resolve to `undefined` when they have no answer; they
 * should not reject for ordinary upstream failures.
 */
export interface WeatherProvider {
  forecastAt(lat: number, lon: number, leadTimeHours: number): Promise<Forecast | undefined>;
}

const API_ROOT = "https://api.open-meteo.com/v1/forecast";
const HOURLY_FIELDS = [
  "temperature_2m",
  "relative_humidity_2m",
  "precipitation",
  "wind_speed_10m",
  "wind_direction_10m",
] as const;

const hourlySchema = z.object({
  hourly: z.object({
    time: z.array(z.string()),
    temperature_2m: z.array(z.number().nullable()),
    relative_humidity_2m: z.array(z.number().nullable()),
    precipitation: z.array(z.number().nullable()),
    wind_speed_10m: z.array(z.number().nullable()),
    wind_direction_10m: z.array(z.number().nullable()),
  }),
});

type HourlySeries = z.infer<typeof hourlySchema>["hourly"];

export interface OpenMeteoOptions {
  fetchFn?: typeof fetch;
  now?: () => Date;
  /** How long a response is reused for the same (rounded) coordinate */
  cacheTtlMs?: number;
  /** Number of *additional* attempts after the first try */
  maxRetries?: number;
  retryDelayMs?: number;
  /** Days of hourly data requested per coordinate */
  forecastDays?: number;
  /** Abort a single request after this long */
  timeoutMs?: number;
}

function delay(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, ms));
}

/** "2025-06-18T14:00" – the hour key Open-Meteo uses with timezone=GMT */
export function hourKey(date: Date): string {
  return `${date.toISOString().slice(0, 13)}:00`;
}

/**
 * Hourly forecasts from Open-Meteo (no API key needed). Responses are
 * cached per coordinate rounded to 0.01° so every rider near the same
 * spot shares one request.
 */
export class OpenMeteoProvider implements WeatherProvider {
  private readonly fetchFn: typeof fetch;
  private readonly now: () => Date;
  private readonly cacheTtlMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly forecastDays: number;
  private readonly timeoutMs: number;
  /** Holds the pending request too, so concurrent lookups share it */
  private readonly cache = new Map<string, { fetchedAt: number; hourly: Promise<HourlySeries> }>();

  constructor(options: OpenMeteoOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.cacheTtlMs = options.cacheTtlMs ?? 10 * 60 * 1000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.forecastDays = options.forecastDays ?? 3;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async forecastAt(lat: number, lon: number, leadTimeHours: number): Promise<Forecast | undefined> {
    try {
      const hourly = await this.hourlyFor(lat, lon);
      const target = new Date(this.now().getTime() + leadTimeHours * 3_600_000);
      const ix = hourly.time.indexOf(hourKey(target));
      if (ix < 0) return undefined;

      const temperature = hourly.temperature_2m[ix];
      const humidity = hourly.relative_humidity_2m[ix];
      const precipitation = hourly.precipitation[ix];
      const windSpeed = hourly.wind_speed_10m[ix];
      const windDirection = hourly.wind_direction_10m[ix];
      if (
        temperature == null ||
        humidity == null ||
        precipitation == null ||
        windSpeed == null ||
        windDirection == null
      ) {
        return undefined;
      }

      return {
        time: new Date(`${hourly.time[ix]}Z`).toISOString(),
        temperatureC: temperature,
        relativeHumidity: humidity,
        precipitationMm: precipitation,
        windSpeedKmh: windSpeed,
        windDirectionDeg: windDirection,
        windCardinal: degreesToCardinal(windDirection),
      };
    } catch (err) {
      console.warn(
        `⚠️ Weather lookup for ${lat.toFixed(3)},${lon.toFixed(3)} failed:`,
        err instanceof Error ? err.message : err
      );
      return undefined;
    }
  }

  private hourlyFor(lat: number, lon: number): Promise<HourlySeries> {
    const key = `${lat.toFixed(2)},${lon.toFixed(2)}`;
    const nowMs = this.now().getTime();
    const cached = this.cache.get(key);
    if (cached && nowMs - cached.fetchedAt < this.cacheTtlMs) return cached.hourly;

    for (const [k, entry] of this.cache) {
      if (nowMs - entry.fetchedAt >= this.cacheTtlMs) this.cache.delete(k);
    }

    const hourly = this.fetchHourly(lat, lon);
    const entry = { fetchedAt: nowMs, hourly };
    this.cache.set(key, entry);
    hourly.catch(() => {
      if (this.cache.get(key) === entry) this.cache.delete(key);
    });
    return hourly;
  }

  private async fetchHourly(lat: number, lon: number): Promise<HourlySeries> {
    const url = new URL(API_ROOT);
    url.searchParams.append("latitude", lat.toFixed(4));
    url.searchParams.append("longitude", lon.toFixed(4));
    url.searchParams.append("hourly", HOURLY_FIELDS.join(","));
    url.searchParams.append("wind_speed_unit", "kmh");
    url.searchParams.append("timezone", "GMT");
    url.searchParams.append("forecast_days", String(this.forecastDays));

    const resp = await this.request(url.toString());
    return hourlySchema.parse(await resp.json()).hourly;
  }

  private async request(url: string, attempt = 0): Promise<Response> {
    const resp = await this.fetchFn(url, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (resp.ok) return resp;

    // A 4xx other than rate limiting means the request itself is wrong
    if (resp.status >= 400 && resp.status < 500 && resp.status !== 429) {
      const txt = await resp.text();
      throw new Error(`Open-Meteo rejected the request (${resp.status}) – ${txt || resp.statusText}`);
    }

    if (attempt < this.maxRetries) {
      const nextAttempt = attempt + 1;
      console.warn(
        `⚠️ Request to Open-Meteo failed (status ${resp.status}). ` +
          `Retry ${nextAttempt}/${this.maxRetries} after ${this.retryDelayMs} ms…`
      );
      await delay(this.retryDelayMs);
      return this.request(url, nextAttempt);
    }

    throw new Error(
      `Open-Meteo request failed after ${this.maxRetries + 1} attempts (status ${resp.status})`
    );
  }
}
