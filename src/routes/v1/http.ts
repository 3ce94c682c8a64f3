import type { Request } from "express";
import type { z } from "zod";
import { ValidationError } from "../../middleware/error.js";
import { buildPageMeta, normalizePageRequest } from "../../services/pagination.js";
import { idParamSchema } from "../../types/schemas.js";
import type { Page, PageMeta, PageRequest } from "../../types/contracts.js";

export const API_PREFIX = "/api/v1";

export function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  prefix: Array<string | number> = []
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, prefix);
  }
  return result.data;
}

export function parseId(value: unknown, name = "id"): string {
  return parseWith(idParamSchema, value, [name]);
}

export function pageRequestOf(req: Request): PageRequest {
  return normalizePageRequest(req.query.limit, req.query.offset);
}

/** Flattens a page and its navigation metadata into one response body. */
export function pagedBody<T, R>(
  page: Page<T>,
  request: PageRequest,
  path: string,
  serialize: (item: T) => R,
  extraParams: Record<string, string | undefined> = {}
): { items: R[] } & PageMeta {
  return {
    items: page.items.map(serialize),
    ...buildPageMeta(page, request, `${API_PREFIX}${path}`, extraParams),
  };
}
