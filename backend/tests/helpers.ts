import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Express } from "express";
import { createApp } from "../src/app.js";
import { DatabaseManager } from "../src/db/database.js";
import { TrackRepository } from "../src/db/track-repository.js";
import { FileSystemStorage } from "../src/services/storage.js";
import { TrackService, type TrackServiceOptions } from "../src/services/track-service.js";
import type { TrackStore } from "../src/types/index.js";

export interface TestContext {
  app: Express;
  database: DatabaseManager;
  blobs: FileSystemStorage;
  tracks: TrackService;
  uploadDir: string;
  cleanup: () => void;
}

export interface TestContextOptions {
  publicBaseUrl?: string;
  maxUploadBytes?: number;
  /** Skip DatabaseManager.initialize() to simulate an unavailable store */
  initializeDatabase?: boolean;
  /** Replace the SQLite repository, e.g. with a failing fake */
  trackStore?: (repository: TrackRepository) => TrackStore;
  now?: TrackServiceOptions["now"];
}

export function makeTmpDir(prefix = "tracks-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function listDir(dir: string): string[] {
  return fs.readdirSync(dir).sort();
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const uploadDir = makeTmpDir();
  const blobs = new FileSystemStorage(uploadDir);
  blobs.ensureRoot();

  const database = new DatabaseManager(":memory:");
  if (options.initializeDatabase !== false) {
    database.initialize();
  }

  const repository = new TrackRepository(database);
  const tracks = new TrackService({
    tracks: options.trackStore ? options.trackStore(repository) : repository,
    blobs,
    publicBaseUrl: options.publicBaseUrl,
    now: options.now,
  });

  const app = createApp({
    database,
    tracks,
    blobs,
    maxUploadBytes: options.maxUploadBytes ?? 1024 * 1024,
  });

  return {
    app,
    database,
    blobs,
    tracks,
    uploadDir,
    cleanup: () => {
      database.close();
      fs.rmSync(uploadDir, { recursive: true, force: true });
    },
  };
}
