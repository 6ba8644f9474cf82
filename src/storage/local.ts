import fsp from "node:fs/promises";
import path from "node:path";
import mime from "mime-types";
import { conflictError, notFoundError } from "../engine/errors.js";
import {
  emptyMetadata,
  numberSetting,
  sha256Hash,
  stringSetting,
  type BackendCallOptions,
  type BackendSettings,
  type FileListPage,
  type FileMetadata,
  type StorageBackend,
  type StorageCapabilities,
} from "./storage.js";

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// Files written outside the service carry no type; infer one from the extension.
function guessContentType(p: string): string | null {
  const type = mime.lookup(p);
  return type === false ? null : type;
}

/** Built-in backend storing files under a local directory. */
export class FilesystemBackend implements StorageBackend {
  readonly type = "filesystem";
  private root = "";
  private maxFileSize: number | null = null;

  async configure(settings: BackendSettings): Promise<void> {
    const root = stringSetting(settings, "root");
    if (!root) {
      throw new Error("filesystem backend requires a root directory");
    }
    this.root = path.resolve(root);
    this.maxFileSize = numberSetting(settings, "max_file_size") ?? null;
    await fsp.mkdir(this.root, { recursive: true });
  }

  describeCapabilities(): StorageCapabilities {
    return {
      canUpload: true,
      canDelete: true,
      canList: true,
      canSignUrls: false,
      canThumbnail: false,
      requiresProxyDownload: true,
      requiresDirectUpload: false,
      maxFileSize: this.maxFileSize,
    };
  }

  // Paths that escape the root are treated as absent.
  private resolve(p: string): string | null {
    const target = path.resolve(this.root, p);
    if (!target.startsWith(this.root + path.sep)) {
      return null;
    }
    return target;
  }

  async statFile(p: string): Promise<FileMetadata | null> {
    const target = this.resolve(p);
    if (!target) return null;
    try {
      const st = await fsp.stat(target);
      if (!st.isFile()) return null;
      return {
        ...emptyMetadata(p),
        contentType: guessContentType(p),
        size: st.size,
        createdAt: st.mtime.toISOString(),
      };
    } catch (err) {
      if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return null;
      throw err;
    }
  }

  async readFile(p: string, opts?: BackendCallOptions): Promise<Buffer> {
    const target = this.resolve(p);
    if (!target) throw notFoundError(p);
    try {
      return await fsp.readFile(target, { signal: opts?.signal });
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "EISDIR" || code === "ENOTDIR") throw notFoundError(p);
      throw err;
    }
  }

  async listFiles(prefix: string, cursor: string | null, limit: number): Promise<FileListPage> {
    const start = prefix ? this.resolve(prefix) : this.root;
    if (!start) return { files: [], cursor: null };

    const all: string[] = [];
    await this.walk(start, all);
    all.sort();

    const remaining = cursor ? all.filter((rel) => rel > cursor) : all;
    const page = remaining.slice(0, limit);
    const files: FileMetadata[] = [];
    for (const rel of page) {
      const meta = await this.statFile(rel);
      if (meta) files.push(meta);
    }
    const next = remaining.length > page.length ? page[page.length - 1] ?? null : null;
    return { files, cursor: next };
  }

  private async walk(dir: string, out: string[]): Promise<void> {
    const entries = await fsp.readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
      if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return null;
      throw err;
    });
    if (!entries) return;
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(full, out);
      } else if (entry.isFile()) {
        out.push(path.relative(this.root, full).split(path.sep).join("/"));
      }
    }
  }

  async storeFile(p: string, content: Buffer, contentType: string, opts?: BackendCallOptions): Promise<FileMetadata> {
    const target = this.resolve(p);
    if (!target) {
      throw conflictError(`Path escapes the storage root: ${p}`);
    }
    await fsp.mkdir(path.dirname(target), { recursive: true });
    try {
      // wx: stored files are immutable, never overwrite
      await fsp.writeFile(target, content, { flag: "wx", signal: opts?.signal });
    } catch (err) {
      if (errnoCode(err) === "EEXIST") throw conflictError(`File already exists: ${p}`);
      throw err;
    }
    return {
      ...emptyMetadata(p),
      contentType,
      contentHash: sha256Hash(content),
      size: content.length,
      createdAt: new Date().toISOString(),
    };
  }

  async deleteFile(p: string): Promise<void> {
    const target = this.resolve(p);
    if (!target) return;
    try {
      await fsp.unlink(target);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw err;
    }
    // Remove the per-file directory once it is empty
    const dir = path.dirname(target);
    if (dir === this.root) return;
    try {
      await fsp.rmdir(dir);
    } catch (err) {
      const code = errnoCode(err);
      if (code !== "ENOTEMPTY" && code !== "EEXIST" && code !== "ENOENT") throw err;
    }
  }
}
