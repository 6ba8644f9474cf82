import jwt from "jsonwebtoken";
import type { JwtPayload } from "jsonwebtoken";
import {
  capabilityMismatchError,
  invalidPayloadError,
  invalidTicketError,
  notFoundError,
  payloadTooLargeError,
} from "../engine/errors.js";
import { callBackend, requireCapability } from "../sources/guard.js";
import type { Source, SourceRegistry } from "../sources/registry.js";
import type { DirectUploadTarget } from "../storage/storage.js";
import { sha256Hash } from "../storage/storage.js";
import { idBody, isFileID, newFileID } from "./ids.js";
import type { FileRecord, FileRegistry } from "./registry.js";

export interface UploadRequest {
  source: string;
  filename: string;
  contentType?: string | null;
  /** Declared size; checked against the limit before anything is stored. */
  size?: number | null;
  /** Bytes for relay uploads. Ignored for sources that take uploads directly. */
  content?: Buffer | null;
  createdBy?: string | null;
  metadata?: Record<string, unknown>;
}

/** What the client needs to remember between the two phases of a direct upload. */
export interface PendingUpload {
  id: string;
  source: string;
  path: string;
  filename: string;
  contentType: string;
  createdBy: string | null;
}

export type UploadResult =
  | { state: "confirmed"; file: FileRecord }
  | { state: "pending"; upload: DirectUploadTarget; ticket: string; pending: PendingUpload };

export interface UploadOrchestratorOptions {
  sources: SourceRegistry;
  files: FileRegistry;
  maxFileSize: number;
  ticketSecret: string;
  /** Seconds. */
  ticketTtl: number;
}

const DEFAULT_CONTENT_TYPE = "application/octet-stream";
// Under the 255-byte name limit of common filesystems.
const MAX_FILENAME_BYTES = 200;
const MAX_EXTENSION_BYTES = 16;

const controlChars = /[\u0000-\u001f\u007f]/g;

function truncateUTF8(s: string, maxBytes: number): string {
  let out = "";
  let used = 0;
  // for..of walks code points, so surrogate pairs stay whole
  for (const ch of s) {
    const size = Buffer.byteLength(ch, "utf8");
    if (used + size > maxBytes) break;
    out += ch;
    used += size;
  }
  return out;
}

function capFilename(name: string): string {
  if (Buffer.byteLength(name, "utf8") <= MAX_FILENAME_BYTES) return name;
  const dot = name.lastIndexOf(".");
  const ext = dot > 0 ? name.slice(dot) : "";
  if (ext === "" || Buffer.byteLength(ext, "utf8") > MAX_EXTENSION_BYTES) {
    return truncateUTF8(name, MAX_FILENAME_BYTES).trim();
  }
  const stem = truncateUTF8(name.slice(0, dot), MAX_FILENAME_BYTES - Buffer.byteLength(ext, "utf8")).trim();
  return stem + ext;
}

/** Reduces a client-supplied name to a single safe path segment of at most 200 UTF-8 bytes. */
export function sanitizeFilename(name: string): string {
  const segments = name
    .replace(controlChars, "")
    .split(/[/\\]/)
    .map((s) => s.trim())
    .filter((s) => s !== "" && s !== "." && s !== "..");
  const joined = capFilename(segments.join("_").trim());
  return joined === "" ? "unnamed" : joined;
}

export function uploadPath(id: string, filename: string): string {
  return `${idBody(id)}/${sanitizeFilename(filename)}`;
}

function claimString(claims: JwtPayload, key: string): string {
  const v: unknown = claims[key];
  if (typeof v !== "string" || v === "") {
    throw invalidTicketError(`missing ${key}`);
  }
  return v;
}

export class UploadOrchestrator {
  private sources: SourceRegistry;
  private files: FileRegistry;
  private maxFileSize: number;
  private ticketSecret: string;
  private ticketTtl: number;

  constructor(opts: UploadOrchestratorOptions) {
    this.sources = opts.sources;
    this.files = opts.files;
    this.maxFileSize = opts.maxFileSize;
    this.ticketSecret = opts.ticketSecret;
    this.ticketTtl = opts.ticketTtl;
  }

  /** The effective byte limit for a source. */
  sizeLimit(source: Source): number {
    const own = source.capabilities.maxFileSize;
    return own !== null && own < this.maxFileSize ? own : this.maxFileSize;
  }

  async beginUpload(req: UploadRequest): Promise<UploadResult> {
    const source = this.sources.get(req.source);
    requireCapability(source, "canUpload", "upload");

    const limit = this.sizeLimit(source);
    const declared = req.content ? req.content.length : req.size ?? null;
    if (declared !== null && declared > limit) {
      throw payloadTooLargeError(declared, limit);
    }

    if (source.capabilities.requiresDirectUpload) {
      return this.beginDirect(source, req);
    }
    if (!req.content) {
      throw invalidPayloadError("File content is required", [{ field: "file", message: "is required" }]);
    }
    return { state: "confirmed", file: await this.relay(source, req, req.content) };
  }

  async confirmUpload(ticket: string): Promise<FileRecord> {
    const pending = this.verifyTicket(ticket);
    const source = this.sources.get(pending.source);

    // A repeated confirm returns the record the first one created
    const existing = await this.files.find(pending.id);
    if (existing && existing.sourceSlug === pending.source && existing.path === pending.path) {
      return existing;
    }

    const stat = await callBackend(source, "statFile", (o) => source.backend.statFile(pending.path, o));
    if (!stat) {
      throw notFoundError(pending.id);
    }

    const size = stat.size ?? 0;
    const limit = this.sizeLimit(source);
    if (size > limit) {
      await this.discard(source, pending.path);
      throw payloadTooLargeError(size, limit);
    }

    return this.files.insert({
      id: pending.id,
      sourceSlug: source.slug,
      path: pending.path,
      filename: pending.filename,
      contentType: stat.contentType ?? pending.contentType,
      contentHash: stat.contentHash,
      size,
      width: stat.width,
      height: stat.height,
      createdBy: pending.createdBy,
    });
  }

  verifyTicket(ticket: string): PendingUpload {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(ticket, this.ticketSecret, { algorithms: ["HS256"] });
    } catch (err) {
      throw invalidTicketError(err instanceof Error ? err.message : "unreadable");
    }
    if (typeof decoded === "string") {
      throw invalidTicketError("unexpected payload");
    }
    const id = claimString(decoded, "fid");
    if (!isFileID(id)) {
      throw invalidTicketError("malformed file id");
    }
    const by: unknown = decoded.by;
    return {
      id,
      source: claimString(decoded, "src"),
      path: claimString(decoded, "path"),
      filename: claimString(decoded, "name"),
      contentType: claimString(decoded, "ct"),
      createdBy: typeof by === "string" ? by : null,
    };
  }

  private async relay(source: Source, req: UploadRequest, content: Buffer): Promise<FileRecord> {
    const store = source.backend.storeFile;
    if (!store) {
      throw capabilityMismatchError(source.slug, "upload");
    }
    const id = newFileID();
    const path = uploadPath(id, req.filename);
    const contentType = req.contentType || DEFAULT_CONTENT_TYPE;

    const stored = await callBackend(source, "storeFile", (o) =>
      store.call(source.backend, path, content, contentType, o),
    );

    try {
      return await this.files.insert({
        id,
        sourceSlug: source.slug,
        path,
        filename: req.filename,
        contentType,
        contentHash: stored.contentHash ?? sha256Hash(content),
        size: stored.size ?? content.length,
        width: stored.width,
        height: stored.height,
        createdBy: req.createdBy ?? null,
        metadata: req.metadata,
      });
    } catch (err) {
      await this.discard(source, path);
      throw err;
    }
  }

  private async beginDirect(source: Source, req: UploadRequest): Promise<UploadResult> {
    const prepare = source.backend.prepareDirectUpload;
    if (!prepare) {
      throw capabilityMismatchError(source.slug, "direct upload");
    }
    const id = newFileID();
    const pending: PendingUpload = {
      id,
      source: source.slug,
      path: uploadPath(id, req.filename),
      filename: req.filename,
      contentType: req.contentType || DEFAULT_CONTENT_TYPE,
      createdBy: req.createdBy ?? null,
    };

    const upload = await callBackend(source, "prepareDirectUpload", (o) =>
      prepare.call(
        source.backend,
        { path: pending.path, filename: pending.filename, contentType: pending.contentType, size: req.size ?? null },
        o,
      ),
    );

    const ticket = jwt.sign(
      {
        fid: pending.id,
        src: pending.source,
        path: pending.path,
        name: pending.filename,
        ct: pending.contentType,
        by: pending.createdBy,
      },
      this.ticketSecret,
      { algorithm: "HS256", expiresIn: this.ticketTtl },
    );
    return { state: "pending", upload, ticket, pending };
  }

  // Best effort: an orphan left here is picked up by the sweep.
  private async discard(source: Source, path: string): Promise<void> {
    const del = source.backend.deleteFile;
    if (!source.capabilities.canDelete || !del) return;
    try {
      await callBackend(source, "deleteFile", (o) => del.call(source.backend, path, o));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`WARN: could not remove ${source.slug}:${path}: ${msg}`);
    }
  }
}
