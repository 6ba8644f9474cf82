import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import {
  Store,
  UniqueViolationError,
  exec,
  jsonObject,
  mapPgError,
  nullableInt,
  nullableText,
  queryRow,
  queryRows,
  text,
} from "./postgres.js";
import { bootstrap } from "./bootstrap.js";

class FakePgError extends Error {
  code = "23505";
  detail = "Key (source_slug, path)=(docs, a.txt) already exists.";
  constraint = "_files_source_path_key";
}

describe("mapPgError", () => {
  it("wraps pg error code 23505 as UniqueViolationError", () => {
    const mapped = mapPgError(new FakePgError('duplicate key value violates unique constraint "_files_source_path_key"'));

    assert.ok(mapped instanceof UniqueViolationError);
    assert.equal(mapped.detail, "Key (source_slug, path)=(docs, a.txt) already exists.");
    assert.equal(mapped.constraint, "_files_source_path_key");
  });

  it("wraps SQLite unique failures", () => {
    const mapped = mapPgError(new Error("UNIQUE constraint failed: _files.id"));
    assert.ok(mapped instanceof UniqueViolationError);
    assert.equal(mapped.constraint, "");
  });

  it("returns other errors unchanged", () => {
    const err = new Error("some other error");
    assert.equal(mapPgError(err), err);
  });

  it("returns null/undefined unchanged", () => {
    assert.equal(mapPgError(null), null);
    assert.equal(mapPgError(undefined), undefined);
  });
});

describe("SQLite store", () => {
  let store: Store;

  before(async () => {
    store = Store.openSQLite(":memory:");
    await bootstrap(store);
  });

  after(async () => {
    await store.close();
  });

  it("binds $n placeholders and encodes objects as JSON", async () => {
    const n = await exec(
      store.pool,
      "INSERT INTO _file_sources (slug, backend_type, config, origin) VALUES ($1, $2, $3, $4)",
      ["docs", "filesystem", { root: "/tmp/docs" }, "config"],
    );
    assert.equal(n, 1);

    const row = await queryRow(store.pool, "SELECT slug, config, origin, created_at FROM _file_sources WHERE slug = $1", [
      "docs",
    ]);
    assert.ok(row);
    assert.equal(text(row, "slug"), "docs");
    assert.deepEqual(jsonObject(row, "config"), { root: "/tmp/docs" });
    assert.match(text(row, "created_at"), /^\d{4}-\d{2}-\d{2}T/);
  });

  it("maps duplicate keys to UniqueViolationError", async () => {
    await assert.rejects(
      exec(store.pool, "INSERT INTO _file_sources (slug, backend_type) VALUES ($1, $2)", ["docs", "filesystem"]),
      UniqueViolationError,
    );
  });

  it("returns an empty list for no matches", async () => {
    const rows = await queryRows(store.pool, "SELECT slug FROM _file_sources WHERE slug = $1", ["nope"]);
    assert.deepEqual(rows, []);
    assert.equal(await queryRow(store.pool, "SELECT slug FROM _file_sources WHERE slug = $1", ["nope"]), null);
  });

  it("builds IN expressions with offset placeholders", () => {
    const expr = store.dialect.inExpr("f.source_slug", ["a", "b"], 2);
    assert.equal(expr.sql, "f.source_slug IN ($3, $4)");
    assert.deepEqual(expr.params, ["a", "b"]);
    assert.equal(store.dialect.inExpr("x", [], 0).sql, "1=0");
  });

  it("lowers non-ASCII text through the dialect", async () => {
    const rows = await queryRows(store.pool, `SELECT ${store.dialect.lower("$1")} AS v, ${store.dialect.lower("$2")} AS n`, [
      "ÉCLAIR Straße",
      null,
    ]);
    assert.deepEqual(rows, [{ v: "éclair straße", n: null }]);
  });
});

describe("column readers", () => {
  it("reads nullable and numeric columns", () => {
    const row = { a: null, b: "42", c: 7, d: "{not json" };
    assert.equal(nullableText(row, "a"), null);
    assert.equal(nullableInt(row, "b"), 42);
    assert.equal(nullableInt(row, "c"), 7);
    assert.deepEqual(jsonObject(row, "d"), {});
  });
});
