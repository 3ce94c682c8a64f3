import type { Server } from "node:http";
import type { z } from "zod";
import { createApp } from "../src/app.js";
import { createServices, type Services } from "../src/services/container.js";
import { openDatabase, type SQLiteDatabase } from "../src/services/database.js";

export const FIXED_NOW = "2024-05-01T10:00:00.000Z";

export type TestContext = {
  db: SQLiteDatabase;
  services: Services;
};

export function createTestContext(options: { searchCaseSensitive?: boolean; now?: () => Date } = {}): TestContext {
  const db = openDatabase({ dbPath: ":memory:" });
  const services = createServices(db, {
    searchCaseSensitive: options.searchCaseSensitive ?? false,
    now: options.now ?? (() => new Date(FIXED_NOW)),
  });
  return { db, services };
}

export function countRows(db: SQLiteDatabase, table: string): number {
  const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
  return row?.count ?? 0;
}

export async function withServer<T>(
  context: TestContext,
  run: (baseURL: string) => Promise<T>
): Promise<T> {
  const app = createApp({ db: context.db, services: context.services });

  const server = await new Promise<Server>((resolve, reject) => {
    const instance = app.listen(0, () => resolve(instance));
    instance.on("error", reject);
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    throw new Error("Failed to resolve test server address");
  }

  const baseURL = `http://127.0.0.1:${address.port}`;
  try {
    return await run(baseURL);
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    context.db.close();
  }
}

/** Reads a JSON response body and checks its shape. */
export async function readJSON<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.infer<T>> {
  const body: unknown = await response.json();
  return schema.parse(body);
}

export function jsonRequest(method: string, body: unknown, userId?: string): RequestInit {
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (userId) {
    headers["x-user-id"] = userId;
  }
  return { method, headers, body: JSON.stringify(body) };
}
