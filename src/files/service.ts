import { capabilityMismatchError, notFoundError } from "../engine/errors.js";
import { callBackend } from "../sources/guard.js";
import type { SourceRegistry } from "../sources/registry.js";
import type { FileRecord, FileRegistry } from "./registry.js";

export class FileService {
  private sources: SourceRegistry;
  private files: FileRegistry;

  constructor(sources: SourceRegistry, files: FileRegistry) {
    this.sources = sources;
    this.files = files;
  }

  /**
   * Deletes the backend object, then the record. If the backend call fails
   * the record stays, so the file is never unreachable while still stored.
   */
  async delete(id: string): Promise<FileRecord> {
    const rec = await this.files.get(id);
    const source = this.sources.get(rec.sourceSlug);
    const del = source.backend.deleteFile;
    if (!source.capabilities.canDelete || !del) {
      throw capabilityMismatchError(source.slug, "delete");
    }
    await callBackend(source, "deleteFile", (o) => del.call(source.backend, rec.path, o));
    if (!(await this.files.delete(id))) {
      // Lost a race with another delete; the outcome is the same
      throw notFoundError(id);
    }
    console.log(`Deleted file ${id} from ${source.slug}`);
    return rec;
  }

  async annotate(id: string, annotation: string | null): Promise<FileRecord> {
    await this.files.get(id);
    await this.files.annotate(id, annotation);
    return this.files.get(id);
  }
}
