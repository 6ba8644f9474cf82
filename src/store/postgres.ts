import fs from "node:fs";
import path from "node:path";
import pg from "pg";
import Database from "better-sqlite3";
import type { DatabaseConfig } from "../config/index.js";
import { newDialect, type Dialect } from "./dialect.js";
import { UNICODE_LOWER } from "./dialect-sqlite.js";

const { Pool } = pg;
type Pool = pg.Pool;

export type Row = Record<string, unknown>;
export type Param = string | number | boolean | null | Date | unknown[] | Record<string, unknown>;

// ── SQLite wrapper ──

function adaptSQLForSQLite(sql: string): string {
  // better-sqlite3 binds anonymous ?; statements are written with $1..$n in order
  return sql.replace(/\$\d+/g, "?").replace(/NOW\(\)/gi, "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')");
}

type SQLiteValue = string | number | bigint | Buffer | null;

function encodeSQLiteParams(params: Param[]): SQLiteValue[] {
  return params.map((p) => {
    if (p === null) return null;
    if (typeof p === "boolean") return p ? 1 : 0;
    if (p instanceof Date) return p.toISOString();
    if (typeof p === "object") return JSON.stringify(p);
    return p;
  });
}

export class SQLiteDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    if (dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("busy_timeout = 5000");
    this.db.function(UNICODE_LOWER, { deterministic: true }, (value: unknown) =>
      typeof value === "string" ? value.toLowerCase() : null,
    );
  }

  query(sql: string, params: Param[] = []): { rows: Row[]; rowCount: number } {
    const adaptedSQL = adaptSQLForSQLite(sql);
    const encodedParams = encodeSQLiteParams(params);

    const trimmed = adaptedSQL.trimStart().toUpperCase();
    const isRead = trimmed.startsWith("SELECT") || trimmed.startsWith("PRAGMA") || trimmed.startsWith("WITH");
    const hasReturning = /\bRETURNING\b/i.test(adaptedSQL);

    const stmt = this.db.prepare<SQLiteValue[], Row>(adaptedSQL);
    if (isRead || hasReturning) {
      const rows = stmt.all(...encodedParams);
      return { rows, rowCount: rows.length };
    }

    const info = stmt.run(...encodedParams);
    return { rows: [], rowCount: info.changes };
  }

  execMulti(sql: string): void {
    this.db.exec(sql);
  }

  close(): void {
    this.db.close();
  }
}

// ── Queryable type ──

export type Queryable = Pool | SQLiteDatabase;

// ── Store class ──

export class Store {
  readonly pool: Queryable;
  readonly dialect: Dialect;

  constructor(pool: Queryable, dialect: Dialect) {
    this.pool = pool;
    this.dialect = dialect;
  }

  static async connect(cfg: DatabaseConfig): Promise<Store> {
    if (cfg.driver === "sqlite") {
      if (cfg.name === ":memory:") {
        return Store.openSQLite(":memory:");
      }
      const dir = cfg.data_dir || "./data";
      fs.mkdirSync(dir, { recursive: true });
      return Store.openSQLite(path.join(dir, `${cfg.name}.db`));
    }

    const pool = new Pool({
      host: cfg.host,
      port: cfg.port,
      user: cfg.user,
      password: cfg.password,
      database: cfg.name,
      max: cfg.pool_size,
    });
    await pool.query("SELECT 1");
    return new Store(pool, newDialect("postgres"));
  }

  static openSQLite(dbPath: string): Store {
    return new Store(new SQLiteDatabase(dbPath), newDialect("sqlite"));
  }

  async execScript(sql: string): Promise<void> {
    if (this.pool instanceof SQLiteDatabase) {
      this.pool.execMulti(sql);
      return;
    }
    await this.pool.query(sql);
  }

  async close(): Promise<void> {
    if (this.pool instanceof SQLiteDatabase) {
      this.pool.close();
    } else {
      await this.pool.end();
    }
  }
}

// ── Error handling ──

export class UniqueViolationError extends Error {
  detail: string;
  constraint: string;

  constructor(message: string, detail: string, constraint: string) {
    super(message);
    this.name = "UniqueViolationError";
    this.detail = detail;
    this.constraint = constraint;
  }
}

function stringProp(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "string" ? value : undefined;
}

export function mapPgError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  // PostgreSQL unique violation
  if (stringProp(err, "code") === "23505") {
    return new UniqueViolationError(
      err.message,
      stringProp(err, "detail") ?? "",
      stringProp(err, "constraint") ?? "",
    );
  }
  // SQLite unique violation: "UNIQUE constraint failed: _files.source_slug, _files.path"
  if (err.message.includes("UNIQUE constraint failed")) {
    return new UniqueViolationError(err.message, err.message, "");
  }
  return err;
}

// ── Query functions ──

export async function queryRows(
  q: Queryable,
  sql: string,
  params: Param[] = [],
): Promise<Row[]> {
  try {
    if (q instanceof SQLiteDatabase) {
      return q.query(sql, params).rows;
    }
    const result = await q.query<Row>(sql, params);
    return result.rows;
  } catch (err) {
    throw mapPgError(err);
  }
}

export async function queryRow(
  q: Queryable,
  sql: string,
  params: Param[] = [],
): Promise<Row | null> {
  const rows = await queryRows(q, sql, params);
  return rows[0] ?? null;
}

export async function exec(
  q: Queryable,
  sql: string,
  params: Param[] = [],
): Promise<number> {
  try {
    if (q instanceof SQLiteDatabase) {
      return q.query(sql, params).rowCount;
    }
    const result = await q.query(sql, params);
    return result.rowCount ?? 0;
  } catch (err) {
    throw mapPgError(err);
  }
}

// ── Column readers ──

export function text(row: Row, key: string): string {
  const value = row[key];
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (value === null || value === undefined) return "";
  return String(value);
}

export function nullableText(row: Row, key: string): string | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  return text(row, key);
}

export function nullableInt(row: Row, key: string): number | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  // pg returns BIGINT as string
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

export function jsonObject(row: Row, key: string): Record<string, unknown> {
  let value = row[key];
  if (typeof value === "string") {
    try {
      value = JSON.parse(value);
    } catch {
      return {};
    }
  }
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}
