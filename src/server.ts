// src/server.ts – start the tracker API
import { configFromEnvironment } from "./config.ts";
import { Db } from "./db.ts";
import { RouteStore } from "./routeStore.ts";
import { buildRouteFromFile } from "./trackLoader.ts";
import { OpenMeteoProvider } from "./weather.ts";
import { createApp } from "./app.ts";

async function main(): Promise<void> {
  const config = configFromEnvironment();

  const routes = new RouteStore(
    () => buildRouteFromFile(config.courseFile, config.distanceUnit),
    config.distanceUnit,
    {
      maxRetries: config.routeLoadRetries,
      retryDelayMs: config.routeLoadRetryDelayMs,
    }
  );
  // A failed load is logged inside; the API still serves riders and weather
  await routes.refresh();

  const db = new Db(config.dbPath);
  const app = createApp({
    routes,
    db,
    weather: config.weatherEnabled ? new OpenMeteoProvider() : undefined,
    featuredRiderId: config.featuredRiderId,
    forecastHours: config.forecastHours,
  });

  // Re-read the course file on SIGHUP, e.g. after a corrected track
  process.on("SIGHUP", () => {
    console.log("🔄 SIGHUP – reloading course file");
    routes.refresh().catch((err) => console.error("❌ Route reload crashed:", err));
  });

  const server = app.listen(config.port, () => {
    console.log(`🚀 Tracker API listening on http://localhost:${config.port}`);
  });

  const shutdown = () => {
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
