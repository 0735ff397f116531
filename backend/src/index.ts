/**
 * Track Upload API Server
 *
 * This server provides endpoints for:
 * - Uploading audio files with metadata
 * - Listing and fetching track metadata
 * - Streaming stored audio content
 */

// Load environment variables from .env file (must be first import)
import "dotenv/config";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { DatabaseManager } from "./db/database.js";
import { TrackRepository } from "./db/track-repository.js";
import { FileSystemStorage } from "./services/storage.js";
import { TrackService } from "./services/track-service.js";

const config = loadConfig();

const blobs = new FileSystemStorage(config.uploadDir);
blobs.ensureRoot();

const database = new DatabaseManager(config.databasePath);
database.initialize();

const tracks = new TrackService({
  tracks: new TrackRepository(database),
  blobs,
  publicBaseUrl: config.publicBaseUrl,
});

const app = createApp({
  database,
  tracks,
  blobs,
  maxUploadBytes: config.maxUploadBytes,
});

const server = app.listen(config.port, config.host, () => {
  console.log(`
====================================
  Track Upload API Server
====================================

  Server running on http://localhost:${config.port}
  Uploads stored in ${blobs.getRoot()}
  Media URLs ${config.publicBaseUrl ? `based at ${config.publicBaseUrl}` : "root-relative"}

  Endpoints:
    GET    /                      Liveness marker
    GET    /health                Health check (with database status)
    POST   /api/tracks/upload     Upload audio file
    GET    /api/tracks?limit=     List tracks (newest first)
    GET    /api/tracks/:id        Get track metadata
    GET    /media/:filename       Stream audio file

====================================
  `);
});

// Graceful shutdown
const shutdown = (signal: string): void => {
  console.log(`\n${signal} received. Shutting down gracefully...`);

  // Stop accepting new connections
  server.close(() => {
    console.log("HTTP server closed");

    database.close();
    console.log("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

export default app;
