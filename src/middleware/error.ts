import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { logger } from "../utils/logger.js";

export type ValidationIssue = {
  path: string;
  message: string;
};

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  public readonly details: ValidationIssue[];

  constructor(message: string, details: ValidationIssue[] = []) {
    super(message, 400, "validation_error");
    this.details = details;
  }

  static fromZodError(error: ZodError, prefix: Array<string | number> = []): ValidationError {
    return new ValidationError("Invalid request data", zodIssues(error, prefix));
  }
}

export class AuthError extends AppError {
  constructor(message = "Authentication required") {
    super(message, 401, "unauthorized");
  }
}

export class NotFoundError extends AppError {
  public readonly entityType: string;

  constructor(entityType: string, entityId: string) {
    super(`${entityType} with ID ${entityId} not found`, 404, "not_found");
    this.entityType = entityType;
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "conflict");
  }
}

export function zodIssues(error: ZodError, prefix: Array<string | number> = []): ValidationIssue[] {
  return error.errors.map((e) => ({
    path: [...prefix, ...e.path].join("."),
    message: e.message,
  }));
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (isMalformedJSON(err)) {
    logger.warn({
      msg: "Malformed JSON body",
      error: err.message,
    });

    return res.status(400).json({
      error: "invalid_json",
      message: "Request body is not valid JSON",
    });
  }

  if (err instanceof ZodError) {
    logger.warn({
      msg: "Validation error",
      errors: err.errors,
    });

    return res.status(400).json({
      error: "validation_error",
      message: "Invalid request data",
      details: zodIssues(err),
    });
  }

  if (err instanceof ValidationError) {
    logger.warn({
      msg: "Validation error",
      message: err.message,
      details: err.details,
    });

    return res.status(err.statusCode).json({
      error: err.code,
      message: err.message,
      details: err.details,
    });
  }

  if (err instanceof AppError) {
    logger.warn({
      msg: "Operational error",
      code: err.code,
      statusCode: err.statusCode,
      message: err.message,
    });

    return res.status(err.statusCode).json({
      error: err.code ?? "error",
      message: err.message,
    });
  }

  logger.error({
    msg: "Internal server error",
    error: err.message,
    stack: err.stack,
  });

  res.status(500).json({
    error: "internal_error",
    message: "An unexpected error occurred",
  });
}

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({
    error: "not_found",
    message: "The requested resource was not found",
  });
}

function isMalformedJSON(err: Error): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}
