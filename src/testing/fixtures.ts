import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Caller } from "../auth/auth.js";
import { parseConfig, type Config } from "../config/index.js";
import type { AccessPredicate } from "../files/scope.js";
import { createCore, type FileCore } from "../server.js";
import { MemoryBackend } from "../storage/memory.js";
import { bootstrap } from "../store/bootstrap.js";
import { Store } from "../store/postgres.js";

export const TEST_JWT_SECRET = "test-secret";
export const TEST_TICKET_SECRET = "test-upload-secret";

export interface Harness {
  store: Store;
  cfg: Config;
  core: FileCore;
}

// An in-memory database with the file tables and the built-in types plus "memory".
export async function openHarness(
  raw: Record<string, unknown> = {},
  isAllowed?: AccessPredicate<Caller>,
): Promise<Harness> {
  const store = Store.openSQLite(":memory:");
  await bootstrap(store);
  const cfg = parseConfig({ jwt_secret: TEST_JWT_SECRET, upload_ticket_secret: TEST_TICKET_SECRET, ...raw });
  const core = createCore(store, cfg, {
    getSecret: () => undefined,
    types: { memory: () => new MemoryBackend() },
    isAllowed,
  });
  return { store, cfg, core };
}

export function tempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `filekeep-${prefix}-`));
}

export function memoryBackendOf(h: Harness, slug: string): MemoryBackend {
  const backend = h.core.sources.get(slug).backend;
  if (!(backend instanceof MemoryBackend)) {
    throw new Error(`source ${slug} is not a memory source`);
  }
  return backend;
}
