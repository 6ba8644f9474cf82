import type { Dialect, InExprResult } from "./dialect.js";
import { buildInExpr } from "./dialect.js";

export class PostgresDialect implements Dialect {
  name(): string {
    return "postgres";
  }

  fileTablesSQL(): string {
    return pgFileTablesSQL;
  }

  inExpr(field: string, values: string[], offset: number): InExprResult {
    return buildInExpr(field, values, offset);
  }

  lower(expr: string): string {
    return `lower(${expr})`;
  }
}

const pgFileTablesSQL = `
CREATE TABLE IF NOT EXISTS _file_sources (
    slug         TEXT PRIMARY KEY,
    backend_type TEXT NOT NULL,
    config       JSONB NOT NULL DEFAULT '{}',
    origin       TEXT NOT NULL DEFAULT 'runtime',
    created_at   TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS _files (
    id           TEXT PRIMARY KEY,
    source_slug  TEXT NOT NULL,
    path         TEXT NOT NULL,
    filename     TEXT NOT NULL,
    content_type TEXT,
    content_hash TEXT,
    size         BIGINT NOT NULL DEFAULT 0,
    width        INTEGER,
    height       INTEGER,
    created_by   TEXT,
    created_at   TIMESTAMPTZ NOT NULL,
    metadata     JSONB NOT NULL DEFAULT '{}',
    CONSTRAINT _files_source_path_key UNIQUE (source_slug, path)
);
CREATE INDEX IF NOT EXISTS idx_files_source_id ON _files (source_slug, id);
CREATE INDEX IF NOT EXISTS idx_files_filename ON _files (lower(filename));
CREATE INDEX IF NOT EXISTS idx_files_content_type ON _files (lower(content_type));

CREATE TABLE IF NOT EXISTS _file_annotations (
    file_id    TEXT PRIMARY KEY REFERENCES _files(id) ON DELETE CASCADE,
    annotation TEXT NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS idx_file_annotations_text ON _file_annotations (lower(annotation));
`;
