import { createHash } from "node:crypto";

/** Declares which operations a backend supports. Fixed once `configure` completes. */
export interface StorageCapabilities {
  canUpload: boolean;
  canDelete: boolean;
  canList: boolean;
  canSignUrls: boolean;
  canThumbnail: boolean;
  /** Bytes must be relayed through this process rather than fetched by the client. */
  requiresProxyDownload: boolean;
  /** Uploads must travel from the client straight to the backend. */
  requiresDirectUpload: boolean;
  maxFileSize: number | null;
}

/** Metadata a backend reports about one stored object. */
export interface FileMetadata {
  path: string;
  filename: string;
  contentType: string | null;
  contentHash: string | null;
  size: number | null;
  width: number | null;
  height: number | null;
  createdAt: string | null;
  metadata: Record<string, unknown>;
}

export interface FileListPage {
  files: FileMetadata[];
  cursor: string | null;
}

export interface DirectUploadRequest {
  path: string;
  filename: string;
  contentType: string;
  size: number | null;
}

/** Where and how the client sends bytes when they bypass this process. */
export interface DirectUploadTarget {
  url: string;
  method: "PUT" | "POST";
  headers: Record<string, string>;
  fields: Record<string, string>;
  expiresAt: string;
}

export interface BackendCallOptions {
  signal?: AbortSignal;
}

export type BackendSettings = Record<string, unknown>;

export type SecretResolver = (name: string) => string | undefined | Promise<string | undefined>;

/**
 * StorageBackend is implemented once per provider type. The optional methods
 * are only invoked when the matching capability flag is set.
 */
export interface StorageBackend {
  readonly type: string;

  configure(settings: BackendSettings, getSecret: SecretResolver): Promise<void>;
  describeCapabilities(): StorageCapabilities;
  /** Returns null for an absent path; never throws for absence. */
  statFile(path: string, opts?: BackendCallOptions): Promise<FileMetadata | null>;
  readFile(path: string, opts?: BackendCallOptions): Promise<Buffer>;

  listFiles?(prefix: string, cursor: string | null, limit: number, opts?: BackendCallOptions): Promise<FileListPage>;
  storeFile?(path: string, content: Buffer, contentType: string, opts?: BackendCallOptions): Promise<FileMetadata>;
  /** Absent paths are not an error. */
  deleteFile?(path: string, opts?: BackendCallOptions): Promise<void>;
  signedDownloadURL?(path: string, ttlSeconds: number, opts?: BackendCallOptions): Promise<string>;
  prepareDirectUpload?(req: DirectUploadRequest, opts?: BackendCallOptions): Promise<DirectUploadTarget>;
  thumbnailURL?(path: string, width: number, height: number, opts?: BackendCallOptions): Promise<string | null>;
}

/** Backends are registered as factories; the source registry instantiates them. */
export type BackendFactory = () => StorageBackend;

export function sha256Hash(content: Buffer): string {
  return "sha256:" + createHash("sha256").update(content).digest("hex");
}

export function baseName(p: string): string {
  const parts = p.split("/");
  return parts[parts.length - 1] ?? p;
}

export function emptyMetadata(path: string): FileMetadata {
  return {
    path,
    filename: baseName(path),
    contentType: null,
    contentHash: null,
    size: null,
    width: null,
    height: null,
    createdAt: null,
    metadata: {},
  };
}

// String settings are the common case; everything else is each backend's business.
export function stringSetting(settings: BackendSettings, key: string): string | undefined {
  const v = settings[key];
  return typeof v === "string" && v !== "" ? v : undefined;
}

export function numberSetting(settings: BackendSettings, key: string): number | undefined {
  const v = settings[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function booleanSetting(settings: BackendSettings, key: string): boolean | undefined {
  const v = settings[key];
  return typeof v === "boolean" ? v : undefined;
}
