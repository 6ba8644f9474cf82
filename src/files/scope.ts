import { notFoundError } from "../engine/errors.js";
import type { SourceRegistry } from "../sources/registry.js";
import type { FileRecord, FileRegistry, SearchPage } from "./registry.js";

/** Host-supplied read check, asked once per source per call. */
export type AccessPredicate<Caller> = (caller: Caller, sourceSlug: string) => boolean | Promise<boolean>;

/**
 * PermissionScope answers every read on behalf of one caller. Nothing is
 * cached between calls, so a changed predicate takes effect on the next one.
 */
export class PermissionScope<Caller> {
  private sources: SourceRegistry;
  private files: FileRegistry;
  private isAllowed: AccessPredicate<Caller>;

  constructor(sources: SourceRegistry, files: FileRegistry, isAllowed: AccessPredicate<Caller>) {
    this.sources = sources;
    this.files = files;
    this.isAllowed = isAllowed;
  }

  async allowedSources(caller: Caller): Promise<string[]> {
    const allowed: string[] = [];
    for (const info of this.sources.list()) {
      if (await this.isAllowed(caller, info.slug)) allowed.push(info.slug);
    }
    return allowed;
  }

  async filterRecords(caller: Caller, records: FileRecord[]): Promise<FileRecord[]> {
    const decisions = new Map<string, boolean>();
    const out: FileRecord[] = [];
    for (const rec of records) {
      let ok = decisions.get(rec.sourceSlug);
      if (ok === undefined) {
        ok = this.sources.has(rec.sourceSlug) && (await this.isAllowed(caller, rec.sourceSlug));
        decisions.set(rec.sourceSlug, ok);
      }
      if (ok) out.push(rec);
    }
    return out;
  }

  // A disallowed id must be indistinguishable from a missing one.
  async getFile(caller: Caller, id: string): Promise<FileRecord> {
    const rec = await this.files.find(id);
    if (!rec) throw notFoundError(id);
    const [visible] = await this.filterRecords(caller, [rec]);
    if (!visible) throw notFoundError(id);
    return visible;
  }

  async getFiles(caller: Caller, ids: string[]): Promise<FileRecord[]> {
    return this.filterRecords(caller, await this.files.getMany(ids));
  }

  async search(caller: Caller, query: string, limit: number, cursor: string | null): Promise<SearchPage> {
    return this.files.search(query, await this.allowedSources(caller), limit, cursor);
  }
}
