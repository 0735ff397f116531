/**
 * Liveness and health endpoints
 */

import { Router, Request, Response } from "express";
import type { DatabaseManager } from "../db/database.js";

export function createHealthRoutes(database: DatabaseManager): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response): void => {
    res.json({ message: "Music Upload API ready" });
  });

  // 503 when the metadata store cannot answer a query
  router.get("/health", (_req: Request, res: Response): void => {
    let schemaVersion: number | null = null;
    try {
      schemaVersion = database.getSchemaVersion();
    } catch (error) {
      console.warn("Health check: database unavailable:", error);
    }

    const available = schemaVersion !== null;
    res.status(available ? 200 : 503).json({
      status: available ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      database: {
        available,
        schemaVersion,
      },
    });
  });

  return router;
}
