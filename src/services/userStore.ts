import { randomUUID } from "node:crypto";
import { isUniqueViolation, UniqueViolationError, type SQLiteDatabase } from "./database.js";
import { listPage, NEWEST_FIRST_SORT } from "./pagination.js";
import type { Page, PageRequest, User } from "../types/contracts.js";

type UserRow = {
  id: string;
  email: string;
  is_admin: number;
  created_at: string;
};

export interface UserRepository {
  /** @throws UniqueViolationError when the email is already registered */
  create(email: string, isAdmin: boolean, createdAt: string): User;
  findById(userId: string): User | null;
  findByEmail(email: string): User | null;
  /** Removes the user's recipes as well. */
  delete(userId: string): boolean;
  listPage(page: PageRequest): Page<User>;
}

export class SqliteUserStore implements UserRepository {
  constructor(private readonly db: SQLiteDatabase) {}

  create(email: string, isAdmin: boolean, createdAt: string): User {
    const user: User = { id: randomUUID(), email, isAdmin, createdAt };
    try {
      this.db
        .prepare("INSERT INTO users (id, email, is_admin, created_at) VALUES (?, ?, ?, ?)")
        .run(user.id, user.email, user.isAdmin ? 1 : 0, user.createdAt);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolationError("User", email);
      }
      throw error;
    }
    return user;
  }

  findById(userId: string): User | null {
    const row = this.db.prepare<[string], UserRow>("SELECT * FROM users WHERE id = ?").get(userId);
    return row ? toUser(row) : null;
  }

  findByEmail(email: string): User | null {
    const row = this.db.prepare<[string], UserRow>("SELECT * FROM users WHERE email = ?").get(email);
    return row ? toUser(row) : null;
  }

  delete(userId: string): boolean {
    return this.db.prepare("DELETE FROM users WHERE id = ?").run(userId).changes > 0;
  }

  listPage(page: PageRequest): Page<User> {
    return listPage<UserRow, User>(this.db, { table: "users", sort: NEWEST_FIRST_SORT }, page, toUser);
  }
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    isAdmin: row.is_admin === 1,
    createdAt: row.created_at,
  };
}
