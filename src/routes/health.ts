import { Router } from "express";
import os from "os";
import { getEnv } from "../config/env.js";
import type { SQLiteDatabase } from "../services/database.js";
import { logger } from "../utils/logger.js";

export function createHealthRouter(db: SQLiteDatabase): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    const env = getEnv();

    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: env.NODE_ENV,
      memory: {
        used: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        total: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
      },
      cpu: {
        cores: os.cpus().length,
        load: os.loadavg(),
      },
      version: process.env.npm_package_version ?? "0.1.0",
    });
  });

  // Ready once the database answers a trivial query.
  router.get("/health/ready", (_req, res) => {
    const timestamp = new Date().toISOString();
    try {
      db.prepare("SELECT 1").get();
      res.json({ ready: true, timestamp });
    } catch (error) {
      logger.error({
        msg: "Readiness check failed",
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({ ready: false, timestamp });
    }
  });

  router.get("/health/live", (_req, res) => {
    res.json({
      alive: true,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
