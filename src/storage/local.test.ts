import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppError } from "../engine/errors.js";
import { FilesystemBackend } from "./local.js";
import { sha256Hash } from "./storage.js";

describe("FilesystemBackend", () => {
  let root: string;
  let backend: FilesystemBackend;

  beforeEach(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "filekeep-fs-"));
    backend = new FilesystemBackend();
    await backend.configure({ root });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("requires a root", async () => {
    await assert.rejects(new FilesystemBackend().configure({}), /requires a root/);
  });

  it("declares relay upload and proxy download", () => {
    const caps = backend.describeCapabilities();
    assert.equal(caps.canUpload, true);
    assert.equal(caps.canSignUrls, false);
    assert.equal(caps.requiresProxyDownload, true);
    assert.equal(caps.requiresDirectUpload, false);
    assert.equal(caps.maxFileSize, null);
  });

  it("stores, stats and reads a file", async () => {
    const content = Buffer.from("hello world");
    const meta = await backend.storeFile("abc/hello.txt", content, "text/plain");
    assert.equal(meta.size, 11);
    assert.equal(meta.contentHash, sha256Hash(content));
    assert.equal(meta.filename, "hello.txt");

    const stat = await backend.statFile("abc/hello.txt");
    assert.equal(stat?.size, 11);
    assert.deepEqual(await backend.readFile("abc/hello.txt"), content);
  });

  it("guesses the content type of files written outside the service", async () => {
    fs.mkdirSync(path.join(root, "scans"));
    fs.writeFileSync(path.join(root, "scans", "invoice.PDF"), "%PDF");
    fs.writeFileSync(path.join(root, "scans", "notes.unknownext"), "?");
    fs.writeFileSync(path.join(root, "scans", "README"), "?");

    assert.equal((await backend.statFile("scans/invoice.PDF"))?.contentType, "application/pdf");
    assert.equal((await backend.statFile("scans/notes.unknownext"))?.contentType, null);

    const page = await backend.listFiles("scans", null, 10);
    assert.deepEqual(
      page.files.map((f) => [f.path, f.contentType]),
      [
        ["scans/README", null],
        ["scans/invoice.PDF", "application/pdf"],
        ["scans/notes.unknownext", null],
      ],
    );
  });

  it("never overwrites an existing path", async () => {
    await backend.storeFile("a.txt", Buffer.from("one"), "text/plain");
    await assert.rejects(
      backend.storeFile("a.txt", Buffer.from("two"), "text/plain"),
      (err: unknown) => err instanceof AppError && err.code === "CONFLICT",
    );
  });

  it("reports absence without throwing from statFile", async () => {
    assert.equal(await backend.statFile("missing.txt"), null);
    await assert.rejects(
      backend.readFile("missing.txt"),
      (err: unknown) => err instanceof AppError && err.code === "NOT_FOUND",
    );
  });

  it("treats paths outside the root as absent", async () => {
    fs.writeFileSync(path.join(os.tmpdir(), "filekeep-outside.txt"), "secret");
    const escape = path.relative(root, path.join(os.tmpdir(), "filekeep-outside.txt"));
    assert.equal(await backend.statFile(escape), null);
    await assert.rejects(
      backend.readFile(escape),
      (err: unknown) => err instanceof AppError && err.code === "NOT_FOUND",
    );
    fs.rmSync(path.join(os.tmpdir(), "filekeep-outside.txt"), { force: true });
  });

  it("deletes idempotently and removes the emptied directory", async () => {
    await backend.storeFile("abc/x.bin", Buffer.from([1, 2, 3]), "application/octet-stream");
    await backend.deleteFile("abc/x.bin");
    await backend.deleteFile("abc/x.bin");
    assert.equal(fs.existsSync(path.join(root, "abc")), false);
  });

  it("lists files in pages", async () => {
    for (const name of ["a/1.txt", "b/2.txt", "c/3.txt"]) {
      await backend.storeFile(name, Buffer.from(name), "text/plain");
    }
    const first = await backend.listFiles("", null, 2);
    assert.deepEqual(
      first.files.map((f) => f.path),
      ["a/1.txt", "b/2.txt"],
    );
    assert.equal(first.cursor, "b/2.txt");

    const second = await backend.listFiles("", first.cursor, 2);
    assert.deepEqual(
      second.files.map((f) => f.path),
      ["c/3.txt"],
    );
    assert.equal(second.cursor, null);

    const scoped = await backend.listFiles("b", null, 10);
    assert.deepEqual(
      scoped.files.map((f) => f.path),
      ["b/2.txt"],
    );
  });
});
