import { notFoundError } from "../engine/errors.js";
import {
  booleanSetting,
  emptyMetadata,
  numberSetting,
  sha256Hash,
  stringSetting,
  type BackendSettings,
  type DirectUploadRequest,
  type DirectUploadTarget,
  type FileListPage,
  type FileMetadata,
  type StorageBackend,
  type StorageCapabilities,
} from "./storage.js";

interface StoredObject {
  content: Buffer;
  contentType: string;
  createdAt: string;
}

/**
 * Keeps objects in process memory. With `signed_urls` it behaves like a
 * remote object store (redirect downloads); with `direct_upload` clients
 * hand bytes to `put` instead of going through storeFile; `thumbnails`
 * turns on preview URLs for image objects.
 */
export class MemoryBackend implements StorageBackend {
  readonly type = "memory";
  private objects = new Map<string, StoredObject>();
  private signedUrls = false;
  private directUpload = false;
  private thumbnails = false;
  private baseURL = "https://files.invalid";
  private maxFileSize: number | null = null;

  async configure(settings: BackendSettings): Promise<void> {
    this.signedUrls = booleanSetting(settings, "signed_urls") ?? false;
    this.directUpload = booleanSetting(settings, "direct_upload") ?? false;
    this.thumbnails = booleanSetting(settings, "thumbnails") ?? false;
    this.baseURL = stringSetting(settings, "base_url") ?? this.baseURL;
    this.maxFileSize = numberSetting(settings, "max_file_size") ?? null;
  }

  describeCapabilities(): StorageCapabilities {
    return {
      canUpload: true,
      canDelete: true,
      canList: true,
      canSignUrls: this.signedUrls,
      canThumbnail: this.thumbnails,
      requiresProxyDownload: !this.signedUrls,
      requiresDirectUpload: this.directUpload,
      maxFileSize: this.maxFileSize,
    };
  }

  /** Writes an object the way a client-direct upload would. */
  put(path: string, content: Buffer, contentType = "application/octet-stream", createdAt = new Date()): void {
    this.objects.set(path, { content, contentType, createdAt: createdAt.toISOString() });
  }

  has(path: string): boolean {
    return this.objects.has(path);
  }

  async statFile(path: string): Promise<FileMetadata | null> {
    const obj = this.objects.get(path);
    if (!obj) return null;
    return this.describe(path, obj);
  }

  async readFile(path: string): Promise<Buffer> {
    const obj = this.objects.get(path);
    if (!obj) throw notFoundError(path);
    return obj.content;
  }

  async listFiles(prefix: string, cursor: string | null, limit: number): Promise<FileListPage> {
    const paths = Array.from(this.objects.keys())
      .filter((p) => p.startsWith(prefix) && (cursor === null || p > cursor))
      .sort();
    const page = paths.slice(0, limit);
    const files: FileMetadata[] = [];
    for (const p of page) {
      const obj = this.objects.get(p);
      if (obj) files.push(this.describe(p, obj));
    }
    const next = paths.length > page.length ? page[page.length - 1] ?? null : null;
    return { files, cursor: next };
  }

  async storeFile(path: string, content: Buffer, contentType: string): Promise<FileMetadata> {
    this.put(path, content, contentType);
    return (await this.statFile(path)) ?? emptyMetadata(path);
  }

  async deleteFile(path: string): Promise<void> {
    this.objects.delete(path);
  }

  async signedDownloadURL(path: string, ttlSeconds: number): Promise<string> {
    return `${this.baseURL}/${encodeURI(path)}?expires_in=${ttlSeconds}`;
  }

  async prepareDirectUpload(req: DirectUploadRequest): Promise<DirectUploadTarget> {
    return {
      url: `${this.baseURL}/${encodeURI(req.path)}`,
      method: "PUT",
      headers: { "Content-Type": req.contentType },
      fields: {},
      expiresAt: new Date(Date.now() + 3600 * 1000).toISOString(),
    };
  }

  // Only images get previews.
  async thumbnailURL(path: string, width: number, height: number): Promise<string | null> {
    const obj = this.objects.get(path);
    if (!obj || !obj.contentType.startsWith("image/")) return null;
    return `${this.baseURL}/${encodeURI(path)}?w=${width}&h=${height}`;
  }

  private describe(path: string, obj: StoredObject): FileMetadata {
    return {
      ...emptyMetadata(path),
      contentType: obj.contentType,
      contentHash: sha256Hash(obj.content),
      size: obj.content.length,
      createdAt: obj.createdAt,
    };
  }
}
