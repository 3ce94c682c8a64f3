import { randomUUID } from "node:crypto";
import type { SQLiteDatabase } from "./database.js";
import { listAll, listPage, NEWEST_FIRST_SORT, type ListQuery } from "./pagination.js";
import type {
  Construction,
  ConstructionStatistics,
  ConstructionStatus,
  Page,
  PageRequest,
} from "../types/contracts.js";

type ConstructionRow = {
  id: string;
  name: string;
  description: string;
  address: string;
  start_date: string | null;
  status: ConstructionStatus;
  img_url: string | null;
  created_at: string;
};

type StatisticsRow = {
  id: string;
  name: string;
  total_items: number;
  total_quantity: number;
};

export type ConstructionInput = {
  name: string;
  description: string;
  address: string;
  startDate: string | null;
  status: ConstructionStatus;
  imgUrl: string | null;
};

export type ConstructionFilter = {
  name?: { query: string; caseSensitive: boolean };
  status?: ConstructionStatus;
};

export class ConstructionStore {
  constructor(private readonly db: SQLiteDatabase) {}

  create(input: ConstructionInput, createdAt: string): Construction {
    const construction: Construction = { id: randomUUID(), ...input, createdAt };
    this.db
      .prepare(`
        INSERT INTO constructions (id, name, description, address, start_date, status, img_url, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        construction.id,
        construction.name,
        construction.description,
        construction.address,
        construction.startDate,
        construction.status,
        construction.imgUrl,
        construction.createdAt
      );
    return construction;
  }

  findById(constructionId: string): Construction | null {
    const row = this.db
      .prepare<[string], ConstructionRow>("SELECT * FROM constructions WHERE id = ?")
      .get(constructionId);
    return row ? toConstruction(row) : null;
  }

  update(constructionId: string, patch: Partial<ConstructionInput>): Construction | null {
    const current = this.findById(constructionId);
    if (!current) {
      return null;
    }

    const next: Construction = {
      ...current,
      name: patch.name ?? current.name,
      description: patch.description ?? current.description,
      address: patch.address ?? current.address,
      startDate: patch.startDate !== undefined ? patch.startDate : current.startDate,
      status: patch.status ?? current.status,
      imgUrl: patch.imgUrl !== undefined ? patch.imgUrl : current.imgUrl,
    };
    this.db
      .prepare(`
        UPDATE constructions
        SET name = ?, description = ?, address = ?, start_date = ?, status = ?, img_url = ?
        WHERE id = ?
      `)
      .run(next.name, next.description, next.address, next.startDate, next.status, next.imgUrl, constructionId);
    return next;
  }

  delete(constructionId: string): boolean {
    return this.db.prepare("DELETE FROM constructions WHERE id = ?").run(constructionId).changes > 0;
  }

  listPage(page: PageRequest, filter: ConstructionFilter = {}): Page<Construction> {
    return listPage<ConstructionRow, Construction>(this.db, constructionQuery(filter), page, toConstruction);
  }

  listAll(): Construction[] {
    return listAll<ConstructionRow, Construction>(this.db, constructionQuery({}), toConstruction);
  }

  /**
   * Distinct materials and summed stock per construction, ordered by name.
   * With `from`, only stock recorded at or after that instant counts.
   */
  statistics(measuredAt: string, from?: string): ConstructionStatistics[] {
    const joinCondition = from
      ? "s.construction_id = c.id AND s.created_at >= ?"
      : "s.construction_id = c.id";
    const params = from ? [from] : [];

    const rows = this.db
      .prepare<unknown[], StatisticsRow>(`
        SELECT c.id, c.name,
          COUNT(DISTINCT s.material_id) AS total_items,
          COALESCE(SUM(s.quantity_value), 0) AS total_quantity
        FROM constructions c
        LEFT JOIN storage_items s ON ${joinCondition}
        GROUP BY c.id, c.name
        ORDER BY c.name ASC, c.id ASC
      `)
      .all(...params);

    return rows.map((row) => ({
      constructionId: row.id,
      constructionName: row.name,
      totalItems: row.total_items,
      totalQuantity: row.total_quantity,
      measuredAt,
    }));
  }
}

function constructionQuery(filter: ConstructionFilter): ListQuery {
  return {
    table: "constructions",
    where: filter.status ? ["status = ?"] : [],
    params: filter.status ? [filter.status] : [],
    sort: NEWEST_FIRST_SORT,
    contains: filter.name
      ? { column: "name", query: filter.name.query, caseSensitive: filter.name.caseSensitive }
      : undefined,
  };
}

function toConstruction(row: ConstructionRow): Construction {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    address: row.address,
    startDate: row.start_date,
    status: row.status,
    imgUrl: row.img_url,
    createdAt: row.created_at,
  };
}
