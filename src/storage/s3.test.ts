import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { S3Backend } from "./s3.js";

// Presigning is computed locally from static credentials; nothing here talks to S3.
const secrets = (name: string) => (name === "S3_SECRET_ACCESS_KEY" ? "test-secret" : undefined);

async function configured(extra: Record<string, unknown> = {}): Promise<S3Backend> {
  const backend = new S3Backend();
  await backend.configure(
    { bucket: "test-bucket", region: "eu-west-1", access_key_id: "test-key", prefix: "/uploads/", ...extra },
    secrets,
  );
  return backend;
}

describe("S3Backend", () => {
  it("requires bucket and region", async () => {
    await assert.rejects(new S3Backend().configure({ region: "eu-west-1" }, secrets), /requires a bucket/);
    await assert.rejects(new S3Backend().configure({ bucket: "b" }, secrets), /requires a region/);
  });

  it("fails when the credentials secret cannot be resolved", async () => {
    await assert.rejects(
      new S3Backend().configure(
        { bucket: "b", region: "eu-west-1", access_key_id: "test-key", secret_access_key_secret: "MISSING" },
        secrets,
      ),
      /secret MISSING is not available/,
    );
  });

  it("signs downloads and takes uploads directly by default", async () => {
    const caps = (await configured()).describeCapabilities();
    assert.equal(caps.canSignUrls, true);
    assert.equal(caps.requiresProxyDownload, false);
    assert.equal(caps.requiresDirectUpload, true);
  });

  it("can be switched to relay uploads", async () => {
    const caps = (await configured({ direct_upload: false })).describeCapabilities();
    assert.equal(caps.requiresDirectUpload, false);
  });

  it("presigns a GET under the configured prefix", async () => {
    const backend = await configured();
    const url = new URL(await backend.signedDownloadURL("abc/report.pdf", 300));
    assert.equal(url.hostname, "test-bucket.s3.eu-west-1.amazonaws.com");
    assert.equal(url.pathname, "/uploads/abc/report.pdf");
    assert.equal(url.searchParams.get("X-Amz-Expires"), "300");
  });

  it("presigns a PUT for direct uploads", async () => {
    const backend = await configured({ endpoint: "http://localhost:9000", force_path_style: true, upload_url_ttl: 600 });
    const target = await backend.prepareDirectUpload({
      path: "abc/photo.png",
      filename: "photo.png",
      contentType: "image/png",
      size: 1024,
    });
    const url = new URL(target.url);
    assert.equal(target.method, "PUT");
    assert.deepEqual(target.headers, { "Content-Type": "image/png" });
    assert.equal(url.host, "localhost:9000");
    assert.equal(url.pathname, "/test-bucket/uploads/abc/photo.png");
    assert.equal(url.searchParams.get("X-Amz-Expires"), "600");
  });
});
