import { Readable } from "node:stream";
import { capabilityMismatchError } from "../engine/errors.js";
import { callBackend, requireCapability } from "../sources/guard.js";
import type { SourceRegistry } from "../sources/registry.js";
import type { StorageCapabilities } from "../storage/storage.js";
import type { FileRecord } from "./registry.js";

export interface RedirectDownload {
  kind: "redirect";
  url: string;
  expiresAt: string;
  headers: Record<string, string>;
}

export interface StreamDownload {
  kind: "stream";
  body: Readable;
  contentType: string;
  filename: string;
  size: number;
  headers: Record<string, string>;
}

export type Download = RedirectDownload | StreamDownload;

/**
 * Builds an inline Content-Disposition with an ASCII fallback and an
 * RFC 5987 filename* parameter for the full name.
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, "_").replace(/["\\]/g, "_");
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (c) => "%" + c.charCodeAt(0).toString(16).toUpperCase(),
  );
  return `inline; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

function redirects(caps: StorageCapabilities): boolean {
  return caps.canSignUrls && !caps.requiresProxyDownload;
}

// File rows never change, so the id is a strong validator.
function streamHeaders(record: FileRecord): { "Cache-Control": string; ETag: string } {
  return {
    "Cache-Control": "public, max-age=31536000, immutable",
    ETag: `"${record.id}"`,
  };
}

export class DownloadResolver {
  private sources: SourceRegistry;
  private signedURLTtl: number;

  constructor(sources: SourceRegistry, signedURLTtl: number) {
    this.sources = sources;
    this.signedURLTtl = signedURLTtl;
  }

  async resolve(record: FileRecord): Promise<Download> {
    const source = this.sources.get(record.sourceSlug);
    const caps = source.capabilities;

    const sign = source.backend.signedDownloadURL;
    if (redirects(caps)) {
      if (!sign) throw capabilityMismatchError(source.slug, "signed URLs");
      const ttl = this.signedURLTtl;
      const url = await callBackend(source, "signedDownloadURL", (o) =>
        sign.call(source.backend, record.path, ttl, o),
      );
      return {
        kind: "redirect",
        url,
        expiresAt: new Date(Date.now() + ttl * 1000).toISOString(),
        // The URL expires; the redirect must not outlive it
        headers: { "Cache-Control": "no-cache" },
      };
    }

    const content = await callBackend(source, "readFile", (o) => source.backend.readFile(record.path, o));
    return {
      kind: "stream",
      body: Readable.from([content]),
      contentType: record.contentType ?? "application/octet-stream",
      filename: record.filename,
      size: content.length,
      headers: streamHeaders(record),
    };
  }

  /**
   * Cache headers for a 304 when the client already holds this file's bytes,
   * or null when the download must be resolved. Reads nothing from the backend.
   */
  notModified(record: FileRecord, ifNoneMatch: string | undefined): Record<string, string> | null {
    if (ifNoneMatch === undefined) return null;
    const source = this.sources.get(record.sourceSlug);
    if (redirects(source.capabilities)) return null;
    const headers = streamHeaders(record);
    const tags = ifNoneMatch.split(",").map((t) => t.trim());
    return tags.includes(headers.ETag) || tags.includes("*") ? headers : null;
  }

  // null when the backend has no preview for this file.
  async thumbnailURL(record: FileRecord, width: number, height: number): Promise<string | null> {
    const source = this.sources.get(record.sourceSlug);
    requireCapability(source, "canThumbnail", "thumbnails");
    const thumb = source.backend.thumbnailURL;
    if (!thumb) throw capabilityMismatchError(source.slug, "thumbnails");
    return callBackend(source, "thumbnailURL", (o) => thumb.call(source.backend, record.path, width, height, o));
  }
}
