import { PostgresDialect } from "./dialect-postgres.js";
import { SQLiteDialect } from "./dialect-sqlite.js";

export interface InExprResult {
  sql: string;
  params: string[];
  nextOffset: number;
}

export interface Dialect {
  name(): string;
  fileTablesSQL(): string;
  inExpr(field: string, values: string[], offset: number): InExprResult;
  /** Case-folds a text expression the way String.prototype.toLowerCase does. */
  lower(expr: string): string;
}

export type DriverName = "sqlite" | "postgres";

export function newDialect(driver: DriverName): Dialect {
  switch (driver) {
    case "sqlite":
      return new SQLiteDialect();
    case "postgres":
      return new PostgresDialect();
  }
}

// Shared by both dialects: positional $n placeholders.
export function buildInExpr(
  field: string,
  values: string[],
  offset: number,
): InExprResult {
  if (values.length === 0) {
    return { sql: "1=0", params: [], nextOffset: offset };
  }
  const placeholders = values.map((_, i) => `$${offset + i + 1}`);
  return {
    sql: `${field} IN (${placeholders.join(", ")})`,
    params: [...values],
    nextOffset: offset + values.length,
  };
}
