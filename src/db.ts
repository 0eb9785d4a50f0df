/*********************************************************************
 * src/db.ts
 *
 * SQLite store for the live feed.
 *
 *   - riders    : one row per rider (id, display name, last update)
 *   - positions : every snapshot received, keyed by (rider_id, reported_at)
 *   - meta      : tiny key/value table (route summary, last ingest, …)
 *
 * The route itself is never stored here; it is rebuilt from the course
 * file on startup.
 *
 * Usage:
 *   import { Db } from "./db.ts";
 *   const db = new Db();                 // automatically creates tables
 *   db.upsertSnapshots(snapshots);
 *   const latest = db.getLatestSnapshots();
 *   db.setMeta("last_ingest_ts", new Date().toISOString());
 *********************************************************************/

import Database from "better-sqlite3";
import * as path from "path";
import type { RiderSnapshot } from "./types.ts";

interface PositionRow {
  rider_id: string;
  name: string | null;
  reported_at: string;
  distance: number;
  speed: number;
  latitude: number | null;
  longitude: number | null;
}

interface SnapshotParams {
  rider_id: string;
  name: string | null;
  reported_at: string;
  distance: number;
  speed: number;
  latitude: number | null;
  longitude: number | null;
}

function toSnapshot(row: PositionRow): RiderSnapshot {
  return {
    riderId: row.rider_id,
    name: row.name,
    reportedDistance: row.distance,
    reportedSpeed: row.speed,
    latitude: row.latitude,
    longitude: row.longitude,
    reportedAt: row.reported_at,
  };
}

/**
 * Small wrapper class – keeps the DB connection private and offers a
 * typed API for the rest of the codebase. Pass ":memory:" for a throwaway
 * database.
 */
export class Db {
  private readonly db: Database.Database;

  constructor(dbPath: string = path.resolve("tracker.db")) {
    this.db = new Database(dbPath);
    this.ensureSchema();
  }

  /** -----------------------------------------------------------------
   *  Create tables if they do not exist.
   * ----------------------------------------------------------------- */
  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS riders (
        id         TEXT PRIMARY KEY,
        name       TEXT,
        updated_at TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS positions (
        rider_id    TEXT NOT NULL REFERENCES riders(id),
        reported_at TEXT NOT NULL,   -- ISO‑8601, UTC
        distance    REAL NOT NULL,   -- route unit
        speed       REAL NOT NULL,   -- route unit per hour
        latitude    REAL,
        longitude   REAL,
        PRIMARY KEY (rider_id, reported_at)
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS meta (
        key   TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  /** -----------------------------------------------------------------
   *  Store a batch of snapshots in one transaction. A second report for
   *  the same rider and timestamp replaces the first; a report without a
   *  name keeps the name already on file.
   * ----------------------------------------------------------------- */
  public upsertSnapshots(snapshots: readonly RiderSnapshot[]): number {
    const riderStmt = this.db.prepare<SnapshotParams>(`
      INSERT INTO riders (id, name, updated_at)
      VALUES (@rider_id, @name, @reported_at)
      ON CONFLICT(id) DO UPDATE SET
        name       = COALESCE(excluded.name, riders.name),
        updated_at = MAX(riders.updated_at, excluded.updated_at);
    `);
    const positionStmt = this.db.prepare<SnapshotParams>(`
      INSERT INTO positions (rider_id, reported_at, distance, speed, latitude, longitude)
      VALUES (@rider_id, @reported_at, @distance, @speed, @latitude, @longitude)
      ON CONFLICT(rider_id, reported_at) DO UPDATE SET
        distance  = excluded.distance,
        speed     = excluded.speed,
        latitude  = excluded.latitude,
        longitude = excluded.longitude;
    `);

    const insertAll = this.db.transaction((rows: readonly RiderSnapshot[]) => {
      for (const s of rows) {
        const params: SnapshotParams = {
          rider_id: s.riderId,
          name: s.name,
          reported_at: s.reportedAt,
          distance: s.reportedDistance,
          speed: s.reportedSpeed,
          latitude: s.latitude,
          longitude: s.longitude,
        };
        riderStmt.run(params);
        positionStmt.run(params);
      }
    });

    insertAll(snapshots);
    return snapshots.length;
  }

  /** -----------------------------------------------------------------
   *  Most recent snapshot of every rider.
   * ----------------------------------------------------------------- */
  public getLatestSnapshots(): RiderSnapshot[] {
    const rows = this.db
      .prepare<[], PositionRow>(`
        SELECT r.id AS rider_id, r.name, p.reported_at, p.distance, p.speed,
               p.latitude, p.longitude
        FROM riders r
        JOIN positions p ON p.rider_id = r.id
        WHERE p.reported_at = (
          SELECT MAX(reported_at) FROM positions WHERE rider_id = r.id
        )
        ORDER BY p.distance DESC
      `)
      .all();
    return rows.map(toSnapshot);
  }

  /** -----------------------------------------------------------------
   *  Snapshots of one rider since `sinceIso`, oldest first.
   * ----------------------------------------------------------------- */
  public getRiderHistory(riderId: string, sinceIso: string): RiderSnapshot[] {
    const rows = this.db
      .prepare<[string, string], PositionRow>(`
        SELECT p.rider_id, r.name, p.reported_at, p.distance, p.speed,
               p.latitude, p.longitude
        FROM positions p
        JOIN riders r ON r.id = p.rider_id
        WHERE p.rider_id = ? AND p.reported_at >= ?
        ORDER BY p.reported_at
      `)
      .all(riderId, sinceIso);
    return rows.map(toSnapshot);
  }

  /** -----------------------------------------------------------------
   *  Meta‑table helpers (generic key/value store)
   * ----------------------------------------------------------------- */
  public getMeta(key: string): string | undefined {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?")
      .get(key);
    return row?.value;
  }

  public setMeta(key: string, value: string): void {
    const stmt = this.db.prepare<[string, string]>(`
      INSERT INTO meta (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value;
    `);
    stmt.run(key, value);
  }

  /** -----------------------------------------------------------------
   *  Close the DB connection – call when you are done.
   * ----------------------------------------------------------------- */
  public close(): void {
    this.db.close();
  }
}
