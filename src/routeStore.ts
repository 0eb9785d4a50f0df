// src/routeStore.ts
import { RouteModel } from "./routeModel.ts";
import type { DistanceUnit } from "./types.ts";

export interface RouteStoreOptions {
  /** Number of *additional* attempts after the first try */
  maxRetries?: number;
  /** Pause between attempts */
  retryDelayMs?: number;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function delay(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, ms));
}

/**
 * Owns the route every component queries.
 *
 * A refresh builds the replacement model off to the side and swaps the
 * reference in one assignment, so callers holding the previous instance keep
 * a consistent view. Until the first successful load (or after a failed
 * one with nothing loaded before) `current` is an empty model and every
 * route query answers "route-unavailable".
 */
export class RouteStore {
  private model: RouteModel;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly loader: () => Promise<RouteModel>,
    unit: DistanceUnit,
    options: RouteStoreOptions = {}
  ) {
    this.model = RouteModel.empty(unit);
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  get current(): RouteModel {
    return this.model;
  }

  /**
   * Load a fresh model and swap it in. Returns false when every attempt
   * failed; the previous model then stays in place.
   */
  async refresh(): Promise<boolean> {
    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const next = await this.loader();
        this.model = next;
        console.log(
          `✅ Route loaded – ${next.points.length} points, ` +
            `${next.totalDistance.toFixed(1)} ${next.unit}, ` +
            `${Math.round(next.totalGain)} m of climbing`
        );
        return true;
      } catch (err) {
        if (attempt < this.maxRetries) {
          console.warn(
            `⚠️ Route load failed (${describeError(err)}). ` +
              `Retry ${attempt + 1}/${this.maxRetries} after ${this.retryDelayMs} ms…`
          );
          await delay(this.retryDelayMs);
          continue;
        }
        console.error(
          `❌ Route load failed after ${this.maxRetries + 1} attempt(s) – ` +
            `continuing without route data:`,
          err
        );
      }
    }
    return false;
  }
}
