import type { Store, Row } from "../store/postgres.js";
import {
  UniqueViolationError,
  exec,
  jsonObject,
  nullableInt,
  nullableText,
  queryRow,
  queryRows,
  text,
} from "../store/postgres.js";
import type { SourceRegistry } from "../sources/registry.js";
import {
  conflictError,
  duplicatePathError,
  invalidPayloadError,
  notFoundError,
  sourceNotFoundError,
} from "../engine/errors.js";
import { isFileID, newFileID } from "./ids.js";
import { ParamBuilder } from "./query.js";

export interface FileRecord {
  id: string;
  sourceSlug: string;
  path: string;
  filename: string;
  contentType: string | null;
  contentHash: string | null;
  size: number;
  width: number | null;
  height: number | null;
  createdBy: string | null;
  createdAt: string;
  metadata: Record<string, unknown>;
  annotation: string | null;
}

export interface NewFileRecord {
  id?: string;
  sourceSlug: string;
  path: string;
  filename: string;
  contentType?: string | null;
  contentHash?: string | null;
  size: number;
  width?: number | null;
  height?: number | null;
  createdBy?: string | null;
  createdAt?: string;
  metadata?: Record<string, unknown>;
}

export interface FilePage {
  files: FileRecord[];
  cursor: string | null;
}

export interface SearchPage extends FilePage {
  /** Allowed sources that had at least one match. */
  sources: string[];
}

export const MAX_PAGE_SIZE = 200;

const selectColumns = `f.id, f.source_slug, f.path, f.filename, f.content_type, f.content_hash,
  f.size, f.width, f.height, f.created_by, f.created_at, f.metadata, a.annotation`;

const fromClause = "_files f LEFT JOIN _file_annotations a ON a.file_id = f.id";

function toRecord(row: Row): FileRecord {
  return {
    id: text(row, "id"),
    sourceSlug: text(row, "source_slug"),
    path: text(row, "path"),
    filename: text(row, "filename"),
    contentType: nullableText(row, "content_type"),
    contentHash: nullableText(row, "content_hash"),
    size: nullableInt(row, "size") ?? 0,
    width: nullableInt(row, "width"),
    height: nullableInt(row, "height"),
    createdBy: nullableText(row, "created_by"),
    createdAt: text(row, "created_at"),
    metadata: jsonObject(row, "metadata"),
    annotation: nullableText(row, "annotation"),
  };
}

// Cursors are opaque to callers: base64url of the last id on the page.
export function encodeCursor(id: string): string {
  return Buffer.from(id, "utf-8").toString("base64url");
}

export function decodeCursor(cursor: string): string {
  const id = Buffer.from(cursor, "base64url").toString("utf-8");
  if (!isFileID(id)) {
    throw invalidPayloadError("Invalid cursor");
  }
  return id;
}

function escapeLike(s: string): string {
  return s.replace(/[\\%_]/g, (c) => "\\" + c);
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit) || limit < 1) return 1;
  return Math.min(Math.floor(limit), MAX_PAGE_SIZE);
}

/**
 * FileRegistry is the durable record of every managed file, independent of
 * where the bytes live. Rows are inserted and deleted, never updated.
 */
export class FileRegistry {
  private store: Store;
  private sources: SourceRegistry;

  constructor(store: Store, sources: SourceRegistry) {
    this.store = store;
    this.sources = sources;
  }

  async insert(rec: NewFileRecord): Promise<FileRecord> {
    if (!this.sources.has(rec.sourceSlug)) {
      throw sourceNotFoundError(rec.sourceSlug);
    }
    if (!Number.isInteger(rec.size) || rec.size < 0) {
      throw invalidPayloadError(`Invalid file size: ${rec.size}`);
    }
    const id = rec.id ?? newFileID();
    if (!isFileID(id)) {
      throw invalidPayloadError(`Invalid file id: ${id}`);
    }

    const record: FileRecord = {
      id,
      sourceSlug: rec.sourceSlug,
      path: rec.path,
      filename: rec.filename,
      contentType: rec.contentType ?? null,
      contentHash: rec.contentHash ?? null,
      size: rec.size,
      width: rec.width ?? null,
      height: rec.height ?? null,
      createdBy: rec.createdBy ?? null,
      createdAt: rec.createdAt ?? new Date().toISOString(),
      metadata: rec.metadata ?? {},
      annotation: null,
    };

    try {
      // The UNIQUE (source_slug, path) constraint decides duplicates atomically
      await exec(
        this.store.pool,
        `INSERT INTO _files
           (id, source_slug, path, filename, content_type, content_hash, size, width, height, created_by, created_at, metadata)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
        [
          record.id,
          record.sourceSlug,
          record.path,
          record.filename,
          record.contentType,
          record.contentHash,
          record.size,
          record.width,
          record.height,
          record.createdBy,
          record.createdAt,
          record.metadata,
        ],
      );
    } catch (err) {
      if (err instanceof UniqueViolationError) {
        if (err.constraint === "_files_source_path_key" || err.detail.includes("path")) {
          throw duplicatePathError(record.sourceSlug, record.path);
        }
        throw conflictError(`File id already exists: ${record.id}`);
      }
      throw err;
    }
    return record;
  }

  async find(id: string): Promise<FileRecord | null> {
    if (!isFileID(id)) return null;
    const row = await queryRow(
      this.store.pool,
      `SELECT ${selectColumns} FROM ${fromClause} WHERE f.id = $1`,
      [id],
    );
    return row ? toRecord(row) : null;
  }

  async get(id: string): Promise<FileRecord> {
    const record = await this.find(id);
    if (!record) throw notFoundError(id);
    return record;
  }

  /** Returns the records that exist, in no particular order. */
  async getMany(ids: string[]): Promise<FileRecord[]> {
    const wanted = Array.from(new Set(ids.filter(isFileID)));
    if (wanted.length === 0) return [];
    const inExpr = this.store.dialect.inExpr("f.id", wanted, 0);
    const rows = await queryRows(
      this.store.pool,
      `SELECT ${selectColumns} FROM ${fromClause} WHERE ${inExpr.sql}`,
      inExpr.params,
    );
    return rows.map(toRecord);
  }

  async findByPath(sourceSlug: string, path: string): Promise<FileRecord | null> {
    const row = await queryRow(
      this.store.pool,
      `SELECT ${selectColumns} FROM ${fromClause} WHERE f.source_slug = $1 AND f.path = $2`,
      [sourceSlug, path],
    );
    return row ? toRecord(row) : null;
  }

  async countBySource(sourceSlug: string): Promise<number> {
    const row = await queryRow(
      this.store.pool,
      "SELECT COUNT(*) AS n FROM _files WHERE source_slug = $1",
      [sourceSlug],
    );
    return row ? nullableInt(row, "n") ?? 0 : 0;
  }

  /** Newest first. */
  async listBySource(sourceSlug: string, limit: number, cursor: string | null): Promise<FilePage> {
    const pb = new ParamBuilder();
    const where = [`f.source_slug = ${pb.add(sourceSlug)}`];
    if (cursor) where.push(`f.id < ${pb.add(decodeCursor(cursor))}`);
    return this.page(where, pb, clampLimit(limit));
  }

  /**
   * Case-insensitive substring match over filename, content type and
   * annotation, restricted to allowedSources. Newest first.
   */
  async search(
    query: string,
    allowedSources: string[],
    limit: number,
    cursor: string | null,
  ): Promise<SearchPage> {
    if (allowedSources.length === 0) {
      return { files: [], cursor: null, sources: [] };
    }
    const pageSize = clampLimit(limit);
    const afterID = cursor ? decodeCursor(cursor) : null;

    const buildFilter = (pb: ParamBuilder): string[] => {
      const inExpr = this.store.dialect.inExpr("f.source_slug", allowedSources, pb.count);
      pb.addAll(inExpr.params);
      const where = [inExpr.sql];
      const needle = query.trim().toLowerCase();
      if (needle !== "") {
        const pattern = `%${escapeLike(needle)}%`;
        const lower = (expr: string) => this.store.dialect.lower(expr);
        where.push(
          `(${lower("f.filename")} LIKE ${pb.add(pattern)} ESCAPE '\\'` +
            ` OR ${lower("COALESCE(f.content_type, '')")} LIKE ${pb.add(pattern)} ESCAPE '\\'` +
            ` OR ${lower("COALESCE(a.annotation, '')")} LIKE ${pb.add(pattern)} ESCAPE '\\')`,
        );
      }
      return where;
    };

    const pb = new ParamBuilder();
    const where = buildFilter(pb);
    if (afterID) where.push(`f.id < ${pb.add(afterID)}`);
    const page = await this.page(where, pb, pageSize);

    // Which sources had hits, regardless of paging
    const spb = new ParamBuilder();
    const sourceWhere = buildFilter(spb);
    const sourceRows = await queryRows(
      this.store.pool,
      `SELECT DISTINCT f.source_slug FROM ${fromClause} WHERE ${sourceWhere.join(" AND ")} ORDER BY f.source_slug`,
      spb.params,
    );

    return { ...page, sources: sourceRows.map((r) => text(r, "source_slug")) };
  }

  async annotate(id: string, annotation: string | null): Promise<void> {
    if (annotation === null || annotation.trim() === "") {
      await exec(this.store.pool, "DELETE FROM _file_annotations WHERE file_id = $1", [id]);
      return;
    }
    await exec(
      this.store.pool,
      `INSERT INTO _file_annotations (file_id, annotation, updated_at) VALUES ($1, $2, $3)
       ON CONFLICT (file_id) DO UPDATE SET annotation = EXCLUDED.annotation, updated_at = EXCLUDED.updated_at`,
      [id, annotation, new Date().toISOString()],
    );
  }

  /** Removes the registry row only; backend bytes are the caller's concern. */
  async delete(id: string): Promise<boolean> {
    if (!isFileID(id)) return false;
    await exec(this.store.pool, "DELETE FROM _file_annotations WHERE file_id = $1", [id]);
    const n = await exec(this.store.pool, "DELETE FROM _files WHERE id = $1", [id]);
    return n > 0;
  }

  private async page(where: string[], pb: ParamBuilder, limit: number): Promise<FilePage> {
    const limitParam = pb.add(limit + 1);
    const rows = await queryRows(
      this.store.pool,
      `SELECT ${selectColumns} FROM ${fromClause}
       WHERE ${where.join(" AND ")}
       ORDER BY f.id DESC
       LIMIT ${limitParam}`,
      pb.params,
    );
    const files = rows.slice(0, limit).map(toRecord);
    const last = files[files.length - 1];
    const cursor = rows.length > limit && last ? encodeCursor(last.id) : null;
    return { files, cursor };
  }
}
