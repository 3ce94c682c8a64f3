import type { Request, Response, NextFunction } from "express";
import { logRequest, logResponse } from "../utils/logger.js";

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const startedAt = Date.now();
  logRequest(req);

  const done = logResponse(req);
  res.on("finish", () => {
    done(res.statusCode, Date.now() - startedAt);
  });

  next();
}
