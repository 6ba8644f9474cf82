import { pipeline } from "node:stream/promises";
import type { Request, Response, NextFunction } from "express";
import { isAdmin, type Caller } from "../auth/auth.js";
import type { DownloadResolver } from "../files/download.js";
import { contentDisposition } from "../files/download.js";
import { syncSource } from "../files/reconcile.js";
import type { FileRecord, FileRegistry } from "../files/registry.js";
import type { PermissionScope } from "../files/scope.js";
import type { FileService } from "../files/service.js";
import type { UploadOrchestrator, UploadResult } from "../files/upload.js";
import type { SourceInfo, SourceRegistry } from "../sources/registry.js";
import type { SourceStore } from "../sources/store.js";
import { forbiddenError, invalidPayloadError, notFoundError, sourceNotFoundError } from "./errors.js";

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

export interface FileHandlerDeps {
  sources: SourceRegistry;
  sourceStore: SourceStore;
  files: FileRegistry;
  uploads: UploadOrchestrator;
  downloads: DownloadResolver;
  service: FileService;
  scope: PermissionScope<Caller>;
}

const DEFAULT_SEARCH_LIMIT = 50;
const MAX_BATCH_IDS = 100;
const DEFAULT_THUMBNAIL_SIZE = 200;
const MAX_THUMBNAIL_SIZE = 2000;

export function serializeFile(rec: FileRecord) {
  return {
    id: rec.id,
    source: rec.sourceSlug,
    path: rec.path,
    filename: rec.filename,
    content_type: rec.contentType,
    content_hash: rec.contentHash,
    size: rec.size,
    width: rec.width,
    height: rec.height,
    created_by: rec.createdBy,
    created_at: rec.createdAt,
    metadata: rec.metadata,
    annotation: rec.annotation,
    download_url: `/api/_files/${rec.id}/download`,
  };
}

function serializeSource(info: SourceInfo) {
  const caps = info.capabilities;
  return {
    slug: info.slug,
    backend_type: info.backendType,
    capabilities: {
      can_upload: caps.canUpload,
      can_delete: caps.canDelete,
      can_list: caps.canList,
      can_sign_urls: caps.canSignUrls,
      can_thumbnail: caps.canThumbnail,
      requires_proxy_download: caps.requiresProxyDownload,
      requires_direct_upload: caps.requiresDirectUpload,
      max_file_size: caps.maxFileSize,
    },
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function body(req: Request): Record<string, unknown> {
  const b: unknown = req.body;
  return isRecord(b) ? b : {};
}

function queryString(req: Request, key: string): string | undefined {
  const v = req.query[key];
  return typeof v === "string" ? v : undefined;
}

function requiredString(b: Record<string, unknown>, field: string): string {
  const v = b[field];
  if (typeof v !== "string" || v.trim() === "") {
    throw invalidPayloadError(`${field} is required`, [{ field, message: "is required" }]);
  }
  return v;
}

function parseLimit(raw: string | undefined): number {
  if (raw === undefined || raw === "") return DEFAULT_SEARCH_LIMIT;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw invalidPayloadError(`Invalid limit: ${raw}`, [{ field: "limit", message: "must be a positive integer" }]);
  }
  return n;
}

function parseDimension(raw: string | undefined, field: string): number {
  if (raw === undefined || raw === "") return DEFAULT_THUMBNAIL_SIZE;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1 || n > MAX_THUMBNAIL_SIZE) {
    throw invalidPayloadError(`Invalid ${field}: ${raw}`, [
      { field, message: `must be an integer from 1 to ${MAX_THUMBNAIL_SIZE}` },
    ]);
  }
  return n;
}

export class FileHandler {
  private deps: FileHandlerDeps;

  constructor(deps: FileHandlerDeps) {
    this.deps = deps;
  }

  listSources = asyncHandler(async (req: Request, res: Response) => {
    const allowed = new Set(await this.deps.scope.allowedSources(req.user));
    const data = this.deps.sources
      .list()
      .filter((s) => allowed.has(s.slug))
      .map(serializeSource);
    res.json({ data });
  });

  createSource = asyncHandler(async (req: Request, res: Response) => {
    const b = body(req);
    const slug = requiredString(b, "slug");
    const backendType = requiredString(b, "backend_type");
    const config = b.config === undefined ? {} : b.config;
    if (!isRecord(config)) {
      throw invalidPayloadError("config must be an object", [{ field: "config", message: "must be an object" }]);
    }
    const source = await this.deps.sourceStore.create(this.deps.sources, slug, backendType, config);
    res.status(201).json({
      data: serializeSource({ slug: source.slug, backendType: source.backendType, capabilities: source.capabilities }),
    });
  });

  removeSource = asyncHandler(async (req: Request, res: Response) => {
    await this.deps.sourceStore.remove(this.deps.sources, req.params.slug ?? "");
    res.json({ data: { deleted: true } });
  });

  syncSource = asyncHandler(async (req: Request, res: Response) => {
    const result = await syncSource(this.deps.sources, this.deps.files, req.params.slug ?? "", {
      prefix: queryString(req, "prefix"),
    });
    res.json({ data: result });
  });

  upload = asyncHandler(async (req: Request, res: Response) => {
    const slug = req.params.source ?? "";
    await this.requireVisibleSource(req.user, slug);

    const file = req.file;
    let result: UploadResult;
    if (file) {
      result = await this.deps.uploads.beginUpload({
        source: slug,
        filename: file.originalname,
        contentType: file.mimetype || null,
        content: file.buffer,
        createdBy: req.user?.id ?? null,
      });
    } else {
      const b = body(req);
      const size = typeof b.size === "number" ? b.size : null;
      if ((b.size !== undefined && size === null) || (size !== null && (!Number.isInteger(size) || size < 0))) {
        throw invalidPayloadError("size must be a non-negative integer", [{ field: "size", message: "is invalid" }]);
      }
      const contentType = b.content_type;
      result = await this.deps.uploads.beginUpload({
        source: slug,
        filename: requiredString(b, "filename"),
        contentType: typeof contentType === "string" ? contentType : null,
        size,
        createdBy: req.user?.id ?? null,
      });
    }

    if (result.state === "confirmed") {
      res.status(201).json({ data: serializeFile(result.file) });
      return;
    }
    res.status(202).json({
      data: {
        id: result.pending.id,
        state: "pending",
        ticket: result.ticket,
        upload: {
          url: result.upload.url,
          method: result.upload.method,
          headers: result.upload.headers,
          fields: result.upload.fields,
          expires_at: result.upload.expiresAt,
        },
      },
    });
  });

  completeUpload = asyncHandler(async (req: Request, res: Response) => {
    const ticket = requiredString(body(req), "ticket");
    const pending = this.deps.uploads.verifyTicket(ticket);
    if (pending.source !== req.params.source) {
      throw invalidPayloadError("Ticket was issued for a different source");
    }
    await this.requireVisibleSource(req.user, pending.source);
    const rec = await this.deps.uploads.confirmUpload(ticket);
    res.status(201).json({ data: serializeFile(rec) });
  });

  search = asyncHandler(async (req: Request, res: Response) => {
    const page = await this.deps.scope.search(
      req.user,
      queryString(req, "q") ?? "",
      parseLimit(queryString(req, "limit")),
      queryString(req, "cursor") || null,
    );
    res.json({ data: page.files.map(serializeFile), next_cursor: page.cursor, sources: page.sources });
  });

  batch = asyncHandler(async (req: Request, res: Response) => {
    const ids = (queryString(req, "ids") ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s !== "");
    if (ids.length > MAX_BATCH_IDS) {
      throw invalidPayloadError(`At most ${MAX_BATCH_IDS} ids per request`);
    }
    const records = await this.deps.scope.getFiles(req.user, ids);
    res.json({ data: records.map(serializeFile) });
  });

  get = asyncHandler(async (req: Request, res: Response) => {
    const rec = await this.deps.scope.getFile(req.user, req.params.id ?? "");
    res.json({ data: serializeFile(rec) });
  });

  download = asyncHandler(async (req: Request, res: Response) => {
    const rec = await this.deps.scope.getFile(req.user, req.params.id ?? "");
    const cached = this.deps.downloads.notModified(rec, req.headers["if-none-match"]);
    if (cached) {
      res.set(cached);
      res.status(304).end();
      return;
    }

    const dl = await this.deps.downloads.resolve(rec);
    res.set(dl.headers);
    if (dl.kind === "redirect") {
      res.redirect(302, dl.url);
      return;
    }
    res.set("Content-Type", dl.contentType);
    res.set("Content-Length", String(dl.size));
    res.set("Content-Disposition", contentDisposition(dl.filename));
    await pipeline(dl.body, res);
  });

  thumbnail = asyncHandler(async (req: Request, res: Response) => {
    const width = parseDimension(queryString(req, "w"), "w");
    const height = parseDimension(queryString(req, "h"), "h");
    const rec = await this.deps.scope.getFile(req.user, req.params.id ?? "");
    const url = await this.deps.downloads.thumbnailURL(rec, width, height);
    if (url === null) throw notFoundError(rec.id);
    res.redirect(302, url);
  });

  annotate = asyncHandler(async (req: Request, res: Response) => {
    const id = req.params.id ?? "";
    await this.deps.scope.getFile(req.user, id);
    const raw = body(req).annotation;
    if (raw !== null && typeof raw !== "string") {
      throw invalidPayloadError("annotation must be a string or null", [
        { field: "annotation", message: "must be a string or null" },
      ]);
    }
    const rec = await this.deps.service.annotate(id, typeof raw === "string" ? raw : null);
    res.json({ data: serializeFile(rec) });
  });

  delete = asyncHandler(async (req: Request, res: Response) => {
    const id = req.params.id ?? "";
    const rec = await this.deps.scope.getFile(req.user, id);
    if (!isAdmin(req.user) && (rec.createdBy === null || rec.createdBy !== req.user?.id)) {
      throw forbiddenError("Only the uploader or an admin can delete this file");
    }
    await this.deps.service.delete(id);
    res.json({ data: { deleted: true } });
  });

  // Uploading to a source the caller cannot read looks the same as a missing source.
  private async requireVisibleSource(caller: Caller, slug: string): Promise<void> {
    const allowed = await this.deps.scope.allowedSources(caller);
    if (!allowed.includes(slug)) throw sourceNotFoundError(slug);
  }
}
