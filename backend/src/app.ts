/**
 * Express application factory
 *
 * Wires the routers to the stores they need. The process entry point
 * (index.ts) and the tests both build the app through here.
 */

import express, { Express } from "express";
import cors from "cors";
import type { DatabaseManager } from "./db/database.js";
import { errorHandler, notFoundHandler } from "./middleware/index.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMediaRoutes } from "./routes/media.js";
import { createTrackRoutes } from "./routes/tracks.js";
import type { TrackService } from "./services/track-service.js";
import type { BlobStorage } from "./types/index.js";

export interface AppDependencies {
  database: DatabaseManager;
  tracks: TrackService;
  blobs: BlobStorage;
  maxUploadBytes: number;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());

  app.use(createHealthRoutes(deps.database));
  app.use(createTrackRoutes(deps.tracks, { maxUploadBytes: deps.maxUploadBytes }));
  app.use(createMediaRoutes(deps.tracks, deps.blobs));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must have 4 params for Express to recognize it as error handler)
  app.use(errorHandler);

  return app;
}
