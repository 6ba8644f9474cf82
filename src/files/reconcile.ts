import { capabilityMismatchError, isAppError } from "../engine/errors.js";
import { callBackend, requireCapability } from "../sources/guard.js";
import type { Source, SourceRegistry } from "../sources/registry.js";
import type { FileListPage } from "../storage/storage.js";
import { baseName } from "../storage/storage.js";
import { idTime, isIDBody } from "./ids.js";
import type { FilePage, FileRegistry } from "./registry.js";

export interface SyncOptions {
  prefix?: string;
  pageSize?: number;
}

export interface SyncResult {
  scanned: number;
  inserted: number;
  skipped: number;
}

export interface SweepOptions {
  graceMs: number;
  dryRun?: boolean;
  now?: number;
}

export interface SweepResult {
  scanned: number;
  /** Paths with no record that are past the grace period. */
  orphans: string[];
  deleted: number;
}

const DEFAULT_PAGE_SIZE = 100;

async function* listAll(source: Source, prefix: string, pageSize: number): AsyncGenerator<FileListPage> {
  const list = source.backend.listFiles;
  if (!list) throw capabilityMismatchError(source.slug, "listing");
  let cursor: string | null = null;
  do {
    const after: string | null = cursor;
    const page: FileListPage = await callBackend(source, "listFiles", (o) =>
      list.call(source.backend, prefix, after, pageSize, o),
    );
    yield page;
    cursor = page.cursor;
  } while (cursor);
}

/** Registers every backend object that has no record yet. */
export async function syncSource(
  sources: SourceRegistry,
  files: FileRegistry,
  slug: string,
  opts: SyncOptions = {},
): Promise<SyncResult> {
  const source = sources.get(slug);
  requireCapability(source, "canList", "listing");

  const result: SyncResult = { scanned: 0, inserted: 0, skipped: 0 };
  for await (const page of listAll(source, opts.prefix ?? "", opts.pageSize ?? DEFAULT_PAGE_SIZE)) {
    for (const meta of page.files) {
      result.scanned++;
      if (await files.findByPath(slug, meta.path)) {
        result.skipped++;
        continue;
      }
      try {
        await files.insert({
          sourceSlug: slug,
          path: meta.path,
          filename: meta.filename || baseName(meta.path),
          contentType: meta.contentType,
          contentHash: meta.contentHash,
          size: meta.size ?? 0,
          width: meta.width,
          height: meta.height,
          createdBy: null,
          metadata: meta.metadata,
        });
        result.inserted++;
      } catch (err) {
        if (!isAppError(err, "DUPLICATE_PATH")) throw err;
        result.skipped++;
      }
    }
  }
  console.log(`Synced source ${slug}: ${result.inserted} inserted, ${result.skipped} skipped`);
  return result;
}

/**
 * Deletes upload-layout objects ({idBody}/...) older than the grace period
 * that no record points at: abandoned direct uploads and leftovers of an
 * interrupted delete.
 */
export async function sweepOrphans(
  sources: SourceRegistry,
  files: FileRegistry,
  slug: string,
  opts: SweepOptions,
): Promise<SweepResult> {
  const source = sources.get(slug);
  requireCapability(source, "canList", "listing");
  requireCapability(source, "canDelete", "delete");
  const del = source.backend.deleteFile;
  if (!del) throw capabilityMismatchError(slug, "delete");

  const cutoff = (opts.now ?? Date.now()) - opts.graceMs;
  const result: SweepResult = { scanned: 0, orphans: [], deleted: 0 };

  for await (const page of listAll(source, "", DEFAULT_PAGE_SIZE)) {
    for (const meta of page.files) {
      result.scanned++;
      const body = meta.path.split("/")[0] ?? "";
      if (!isIDBody(body) || !meta.path.includes("/")) continue;
      if (idTime(body) > cutoff) continue;
      if (await files.findByPath(slug, meta.path)) continue;
      result.orphans.push(meta.path);
    }
  }

  if (!opts.dryRun) {
    for (const path of result.orphans) {
      await callBackend(source, "deleteFile", (o) => del.call(source.backend, path, o));
      result.deleted++;
    }
  }
  if (result.orphans.length > 0) {
    console.log(
      `Swept source ${slug}: ${result.orphans.length} orphan(s)${opts.dryRun ? " (dry run)" : ""}`,
    );
  }
  return result;
}

/** Ids whose backend object is gone. Reported only; nothing is removed. */
export async function findDanglingRecords(
  sources: SourceRegistry,
  files: FileRegistry,
  slug: string,
): Promise<string[]> {
  const source = sources.get(slug);
  const dangling: string[] = [];
  let cursor: string | null = null;
  do {
    const page: FilePage = await files.listBySource(slug, DEFAULT_PAGE_SIZE, cursor);
    for (const rec of page.files) {
      const stat = await callBackend(source, "statFile", (o) => source.backend.statFile(rec.path, o));
      if (!stat) dangling.push(rec.id);
    }
    cursor = page.cursor;
  } while (cursor);
  if (dangling.length > 0) {
    console.warn(`WARN: source ${slug} has ${dangling.length} record(s) without a backend object`);
  }
  return dangling;
}
