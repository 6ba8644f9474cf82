import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { createHash } from "node:crypto";
import { notFoundError } from "../engine/errors.js";
import {
  booleanSetting,
  emptyMetadata,
  numberSetting,
  stringSetting,
  type BackendCallOptions,
  type BackendSettings,
  type DirectUploadRequest,
  type DirectUploadTarget,
  type FileListPage,
  type FileMetadata,
  type SecretResolver,
  type StorageBackend,
  type StorageCapabilities,
} from "./storage.js";

function isMissing(err: unknown): boolean {
  if (!(err instanceof S3ServiceException)) return false;
  return err.name === "NotFound" || err.name === "NoSuchKey" || err.$metadata.httpStatusCode === 404;
}

// S3 reports SHA-256 checksums base64 encoded.
function checksumToHash(checksum: string | undefined): string | null {
  if (!checksum || checksum.includes("-")) return null;
  return "sha256:" + Buffer.from(checksum, "base64").toString("hex");
}

/**
 * S3-compatible object storage. Downloads go through presigned GET URLs and,
 * unless `direct_upload` is false, uploads go straight from the client through
 * presigned PUT URLs.
 */
export class S3Backend implements StorageBackend {
  readonly type = "s3";
  private client: S3Client | null = null;
  private bucket = "";
  private prefix = "";
  private directUpload = true;
  private uploadTTL = 3600;
  private maxFileSize: number | null = null;

  async configure(settings: BackendSettings, getSecret: SecretResolver): Promise<void> {
    const bucket = stringSetting(settings, "bucket");
    const region = stringSetting(settings, "region");
    if (!bucket) throw new Error("s3 backend requires a bucket");
    if (!region) throw new Error("s3 backend requires a region");

    const accessKeyId = stringSetting(settings, "access_key_id");
    let credentials: { accessKeyId: string; secretAccessKey: string } | undefined;
    if (accessKeyId) {
      const secretName = stringSetting(settings, "secret_access_key_secret") ?? "S3_SECRET_ACCESS_KEY";
      const secretAccessKey = await getSecret(secretName);
      if (!secretAccessKey) {
        throw new Error(`secret ${secretName} is not available`);
      }
      credentials = { accessKeyId, secretAccessKey };
    }

    this.bucket = bucket;
    this.prefix = (stringSetting(settings, "prefix") ?? "").replace(/^\/+|\/+$/g, "");
    this.directUpload = booleanSetting(settings, "direct_upload") ?? true;
    this.uploadTTL = numberSetting(settings, "upload_url_ttl") ?? 3600;
    this.maxFileSize = numberSetting(settings, "max_file_size") ?? null;
    this.client = new S3Client({
      region,
      endpoint: stringSetting(settings, "endpoint"),
      forcePathStyle: booleanSetting(settings, "force_path_style") ?? false,
      credentials,
    });
  }

  describeCapabilities(): StorageCapabilities {
    return {
      canUpload: true,
      canDelete: true,
      canList: true,
      canSignUrls: true,
      canThumbnail: false,
      requiresProxyDownload: false,
      requiresDirectUpload: this.directUpload,
      maxFileSize: this.maxFileSize,
    };
  }

  private s3(): S3Client {
    if (!this.client) {
      throw new Error("s3 backend is not configured");
    }
    return this.client;
  }

  private key(p: string): string {
    return this.prefix ? `${this.prefix}/${p}` : p;
  }

  private relative(key: string): string {
    return this.prefix && key.startsWith(this.prefix + "/") ? key.slice(this.prefix.length + 1) : key;
  }

  async statFile(p: string, opts?: BackendCallOptions): Promise<FileMetadata | null> {
    try {
      const head = await this.s3().send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: this.key(p), ChecksumMode: "ENABLED" }),
        { abortSignal: opts?.signal },
      );
      return {
        ...emptyMetadata(p),
        contentType: head.ContentType ?? null,
        contentHash: checksumToHash(head.ChecksumSHA256),
        size: head.ContentLength ?? null,
        createdAt: head.LastModified?.toISOString() ?? null,
        metadata: head.ETag ? { etag: head.ETag } : {},
      };
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async readFile(p: string, opts?: BackendCallOptions): Promise<Buffer> {
    try {
      const obj = await this.s3().send(
        new GetObjectCommand({ Bucket: this.bucket, Key: this.key(p) }),
        { abortSignal: opts?.signal },
      );
      if (!obj.Body) throw notFoundError(p);
      return Buffer.from(await obj.Body.transformToByteArray());
    } catch (err) {
      if (isMissing(err)) throw notFoundError(p);
      throw err;
    }
  }

  async listFiles(prefix: string, cursor: string | null, limit: number, opts?: BackendCallOptions): Promise<FileListPage> {
    const out = await this.s3().send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: this.key(prefix),
        ContinuationToken: cursor ?? undefined,
        MaxKeys: limit,
      }),
      { abortSignal: opts?.signal },
    );
    const files: FileMetadata[] = [];
    for (const obj of out.Contents ?? []) {
      if (!obj.Key || obj.Key.endsWith("/")) continue;
      files.push({
        ...emptyMetadata(this.relative(obj.Key)),
        size: obj.Size ?? null,
        createdAt: obj.LastModified?.toISOString() ?? null,
      });
    }
    return { files, cursor: out.NextContinuationToken ?? null };
  }

  async storeFile(p: string, content: Buffer, contentType: string, opts?: BackendCallOptions): Promise<FileMetadata> {
    const digest = createHash("sha256").update(content).digest();
    await this.s3().send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.key(p),
        Body: content,
        ContentType: contentType,
        ChecksumSHA256: digest.toString("base64"),
      }),
      { abortSignal: opts?.signal },
    );
    return {
      ...emptyMetadata(p),
      contentType,
      contentHash: "sha256:" + digest.toString("hex"),
      size: content.length,
      createdAt: new Date().toISOString(),
    };
  }

  async deleteFile(p: string, opts?: BackendCallOptions): Promise<void> {
    await this.s3().send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: this.key(p) }),
      { abortSignal: opts?.signal },
    );
  }

  async signedDownloadURL(p: string, ttlSeconds: number): Promise<string> {
    const getCommand = new GetObjectCommand({ Bucket: this.bucket, Key: this.key(p) });
    return getSignedUrl(this.s3(), getCommand, { expiresIn: ttlSeconds });
  }

  async prepareDirectUpload(req: DirectUploadRequest): Promise<DirectUploadTarget> {
    const putCommand = new PutObjectCommand({
      Bucket: this.bucket,
      Key: this.key(req.path),
      ContentType: req.contentType,
      ContentLength: req.size ?? undefined,
    });
    const url = await getSignedUrl(this.s3(), putCommand, { expiresIn: this.uploadTTL });
    return {
      url,
      method: "PUT",
      headers: { "Content-Type": req.contentType },
      fields: {},
      expiresAt: new Date(Date.now() + this.uploadTTL * 1000).toISOString(),
    };
  }
}
