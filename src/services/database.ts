import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { ConflictError } from "../middleware/error.js";

export type SQLiteDatabase = Database.Database;

type DatabaseOptions = {
  dbPath: string;
};

/** Raised by stores when a unique index rejects an insert or update. */
export class UniqueViolationError extends Error {
  constructor(
    readonly entity: string,
    readonly value: string
  ) {
    super(`${entity} '${value}' already exists`);
    this.name = "UniqueViolationError";
  }
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    email TEXT NOT NULL UNIQUE,
    is_admin INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS recipes (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    external_url TEXT,
    image_url TEXT,
    preparation_steps TEXT NOT NULL DEFAULT '',
    prep_time_minutes INTEGER NOT NULL DEFAULT 0 CHECK (prep_time_minutes >= 0),
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_recipes_user ON recipes(user_id);
  CREATE INDEX IF NOT EXISTS idx_recipes_created ON recipes(created_at DESC);

  CREATE TABLE IF NOT EXISTS catalog_items (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    last_used TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_catalog_items_last_used ON catalog_items(last_used DESC);

  CREATE TABLE IF NOT EXISTS recipe_items (
    id TEXT PRIMARY KEY,
    recipe_id TEXT NOT NULL REFERENCES recipes(id) ON DELETE CASCADE,
    item_id TEXT NOT NULL REFERENCES catalog_items(id),
    position INTEGER NOT NULL,
    quantity_value REAL NOT NULL CHECK (quantity_value >= 0),
    quantity_unit TEXT NOT NULL,
    UNIQUE (recipe_id, position)
  );
  CREATE INDEX IF NOT EXISTS idx_recipe_items_item ON recipe_items(item_id);

  CREATE TABLE IF NOT EXISTS categories (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS materials (
    id TEXT PRIMARY KEY,
    category_id TEXT NOT NULL REFERENCES categories(id),
    name TEXT NOT NULL UNIQUE,
    description TEXT NOT NULL DEFAULT '',
    unit TEXT NOT NULL DEFAULT 'other',
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_materials_category ON materials(category_id);

  CREATE TABLE IF NOT EXISTS constructions (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    address TEXT NOT NULL DEFAULT '',
    start_date TEXT,
    status TEXT NOT NULL DEFAULT 'inactive',
    img_url TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS storage_items (
    construction_id TEXT NOT NULL REFERENCES constructions(id) ON DELETE CASCADE,
    material_id TEXT NOT NULL REFERENCES materials(id) ON DELETE CASCADE,
    quantity_value REAL NOT NULL CHECK (quantity_value >= 0),
    created_at TEXT NOT NULL,
    PRIMARY KEY (construction_id, material_id)
  );
  CREATE INDEX IF NOT EXISTS idx_storage_items_material ON storage_items(material_id);
`;

export function openDatabase(options: DatabaseOptions): SQLiteDatabase {
  if (options.dbPath !== ":memory:") {
    mkdirSync(dirname(options.dbPath), { recursive: true });
  }

  const db = new Database(options.dbPath);
  if (options.dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
  db.pragma("foreign_keys = ON");

  // Unicode-aware lower-casing; SQLite's own lower() only folds ASCII.
  db.function("fold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : value
  );

  db.exec(SCHEMA);
  return db;
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === "SQLITE_CONSTRAINT_UNIQUE" || error.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

export function isForeignKeyViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === "SQLITE_CONSTRAINT_FOREIGNKEY";
}

/** Another connection holds the write lock past the busy timeout. */
export function isBusy(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code.startsWith("SQLITE_BUSY");
}

/** Runs a store write, reporting unique-index rejections as 409 conflicts. */
export function withConflictMapping<T>(write: () => T): T {
  try {
    return write();
  } catch (error) {
    if (error instanceof UniqueViolationError) {
      throw new ConflictError(error.message);
    }
    throw error;
  }
}
