import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { AppError } from "../engine/errors.js";
import { MemoryBackend } from "../storage/memory.js";
import type { StorageCapabilities } from "../storage/storage.js";
import { memoryBackendOf, openHarness, type Harness } from "../testing/fixtures.js";
import type { FileRecord } from "./registry.js";

class KeepForeverBackend extends MemoryBackend {
  describeCapabilities(): StorageCapabilities {
    return { ...super.describeCapabilities(), canDelete: false };
  }
}

function hasCode(code: string) {
  return (err: unknown) => err instanceof AppError && err.code === code;
}

describe("FileService", () => {
  let h: Harness;

  async function upload(source: string, name: string): Promise<FileRecord> {
    const result = await h.core.uploads.beginUpload({ source, filename: name, content: Buffer.from(name) });
    if (result.state !== "confirmed") throw new Error("expected a confirmed upload");
    return result.file;
  }

  beforeEach(async () => {
    h = await openHarness();
    h.core.sources.registerType("keep", () => new KeepForeverBackend());
    await h.core.sourceStore.load(h.core.sources, {
      mem: { storage: "memory", config: {} },
      vault: { storage: "keep", config: {} },
    });
  });

  afterEach(async () => {
    await h.store.close();
  });

  describe("delete", () => {
    it("removes the backend object and then the record", async () => {
      const file = await upload("mem", "a.txt");
      await h.core.service.delete(file.id);

      await assert.rejects(h.core.files.get(file.id), hasCode("NOT_FOUND"));
      await assert.rejects(memoryBackendOf(h, "mem").readFile(file.path), hasCode("NOT_FOUND"));
    });

    it("keeps the record when the backend delete fails", async () => {
      const file = await upload("mem", "b.txt");
      memoryBackendOf(h, "mem").deleteFile = async () => {
        throw new Error("permission denied");
      };

      await assert.rejects(
        h.core.service.delete(file.id),
        (err: unknown) =>
          err instanceof AppError &&
          err.code === "BACKEND_UNAVAILABLE" &&
          err.message === "Source mem unavailable during deleteFile: permission denied",
      );
      assert.equal((await h.core.files.get(file.id)).id, file.id);
    });

    it("refuses sources that cannot delete", async () => {
      const file = await upload("vault", "c.txt");
      await assert.rejects(h.core.service.delete(file.id), hasCode("CAPABILITY_MISMATCH"));
      assert.equal((await h.core.files.get(file.id)).id, file.id);
    });

    it("reports unknown ids as NotFound", async () => {
      await assert.rejects(h.core.service.delete("df-01hqz8y7k9m2n3p4q5r6s7t8v9"), hasCode("NOT_FOUND"));
    });
  });

  describe("annotate", () => {
    it("sets and clears the annotation", async () => {
      const file = await upload("mem", "d.txt");
      assert.equal((await h.core.service.annotate(file.id, "quarterly numbers")).annotation, "quarterly numbers");
      assert.equal((await h.core.service.annotate(file.id, null)).annotation, null);
    });

    it("reports unknown ids as NotFound", async () => {
      await assert.rejects(h.core.service.annotate("df-01hqz8y7k9m2n3p4q5r6s7t8v9", "x"), hasCode("NOT_FOUND"));
    });
  });
});
