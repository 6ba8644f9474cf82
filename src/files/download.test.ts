import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { AppError } from "../engine/errors.js";
import { openHarness, tempDir, type Harness } from "../testing/fixtures.js";
import { contentDisposition } from "./download.js";

async function readAll(body: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

describe("contentDisposition", () => {
  it("quotes plain names", () => {
    assert.equal(contentDisposition("report.pdf"), `inline; filename="report.pdf"; filename*=UTF-8''report.pdf`);
  });

  it("adds an encoded form for non-ASCII and special characters", () => {
    assert.equal(
      contentDisposition("résumé (1).pdf"),
      `inline; filename="r_sum_ (1).pdf"; filename*=UTF-8''r%C3%A9sum%C3%A9%20%281%29.pdf`,
    );
    assert.equal(contentDisposition('a"b.txt'), `inline; filename="a_b.txt"; filename*=UTF-8''a%22b.txt`);
  });
});

describe("DownloadResolver", () => {
  let h: Harness;
  let root: string;

  beforeEach(async () => {
    root = tempDir("download");
    h = await openHarness({ storage: { signed_url_ttl: 120 } });
    await h.core.sourceStore.load(h.core.sources, {
      docs: { storage: "filesystem", config: { root } },
      images: { storage: "memory", config: { signed_urls: true } },
      gallery: { storage: "memory", config: { thumbnails: true } },
    });
  });

  afterEach(async () => {
    await h.store.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("streams proxy-only sources with immutable caching", async () => {
    const content = Buffer.from("This is a 29-byte text file.\n");
    const result = await h.core.uploads.beginUpload({
      source: "docs",
      filename: "notes.txt",
      contentType: "text/plain",
      content,
    });
    if (result.state !== "confirmed") throw new Error("expected a confirmed upload");

    const dl = await h.core.downloads.resolve(result.file);
    assert.equal(dl.kind, "stream");
    if (dl.kind !== "stream") return;
    assert.equal(dl.contentType, "text/plain");
    assert.equal(dl.filename, "notes.txt");
    assert.equal(dl.size, 29);
    assert.deepEqual(dl.headers, {
      "Cache-Control": "public, max-age=31536000, immutable",
      ETag: `"${result.file.id}"`,
    });
    assert.deepEqual(await readAll(dl.body), content);
  });

  it("redirects sources that sign URLs", async () => {
    const result = await h.core.uploads.beginUpload({
      source: "images",
      filename: "beach.jpg",
      contentType: "image/jpeg",
      content: Buffer.from([0xff, 0xd8]),
    });
    if (result.state !== "confirmed") throw new Error("expected a confirmed upload");

    const before = Date.now();
    const dl = await h.core.downloads.resolve(result.file);
    assert.equal(dl.kind, "redirect");
    if (dl.kind !== "redirect") return;
    assert.equal(dl.url, `https://files.invalid/${result.file.path}?expires_in=120`);
    assert.deepEqual(dl.headers, { "Cache-Control": "no-cache" });
    const expires = Date.parse(dl.expiresAt);
    assert.ok(expires >= before + 120_000 && expires <= Date.now() + 120_000);
  });

  it("asks thumbnail-capable sources for a preview URL", async () => {
    const photo = await h.core.uploads.beginUpload({
      source: "gallery",
      filename: "cat.png",
      contentType: "image/png",
      content: Buffer.from([0x89, 0x50]),
    });
    const text = await h.core.uploads.beginUpload({ source: "gallery", filename: "a.txt", content: Buffer.from("a") });
    if (photo.state !== "confirmed" || text.state !== "confirmed") throw new Error("expected confirmed uploads");

    assert.equal(
      await h.core.downloads.thumbnailURL(photo.file, 64, 48),
      `https://files.invalid/${photo.file.path}?w=64&h=48`,
    );
    assert.equal(await h.core.downloads.thumbnailURL(text.file, 64, 48), null);
  });

  it("refuses thumbnails on sources without them", async () => {
    const result = await h.core.uploads.beginUpload({ source: "docs", filename: "p.png", content: Buffer.from("p") });
    if (result.state !== "confirmed") throw new Error("expected a confirmed upload");
    await assert.rejects(
      h.core.downloads.thumbnailURL(result.file, 64, 64),
      (err: unknown) => err instanceof AppError && err.code === "CAPABILITY_MISMATCH",
    );
  });

  it("answers a revalidation from the record alone", async () => {
    const result = await h.core.uploads.beginUpload({ source: "docs", filename: "cached.txt", content: Buffer.from("c") });
    if (result.state !== "confirmed") throw new Error("expected a confirmed upload");
    // Bytes gone from disk: a 304 must not need them
    fs.rmSync(path.join(root, result.file.path));

    const etag = `"${result.file.id}"`;
    assert.deepEqual(h.core.downloads.notModified(result.file, etag), {
      "Cache-Control": "public, max-age=31536000, immutable",
      ETag: etag,
    });
    assert.deepEqual(h.core.downloads.notModified(result.file, `"other", ${etag}`)?.ETag, etag);
    assert.equal(h.core.downloads.notModified(result.file, `"df-other"`), null);
    assert.equal(h.core.downloads.notModified(result.file, undefined), null);
  });

  it("never answers 304 for redirecting sources", async () => {
    const result = await h.core.uploads.beginUpload({ source: "images", filename: "a.jpg", content: Buffer.from("a") });
    if (result.state !== "confirmed") throw new Error("expected a confirmed upload");
    assert.equal(h.core.downloads.notModified(result.file, `"${result.file.id}"`), null);
  });

  it("surfaces missing bytes as NotFound before streaming", async () => {
    const result = await h.core.uploads.beginUpload({
      source: "docs",
      filename: "gone.txt",
      content: Buffer.from("bye"),
    });
    if (result.state !== "confirmed") throw new Error("expected a confirmed upload");
    fs.rmSync(path.join(root, result.file.path));

    await assert.rejects(
      h.core.downloads.resolve(result.file),
      (err: unknown) => err instanceof AppError && err.code === "NOT_FOUND",
    );
  });
});
