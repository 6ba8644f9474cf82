import {
  AppError,
  configurationError,
  invalidPayloadError,
  sourceExistsError,
  sourceNotFoundError,
  unknownBackendTypeError,
} from "../engine/errors.js";
import type {
  BackendFactory,
  BackendSettings,
  SecretResolver,
  StorageBackend,
  StorageCapabilities,
} from "../storage/storage.js";

export type SourceOrigin = "config" | "runtime";

export interface Source {
  slug: string;
  backendType: string;
  backend: StorageBackend;
  capabilities: StorageCapabilities;
  settings: BackendSettings;
  origin: SourceOrigin;
  timeoutMs: number;
}

export interface SourceInfo {
  slug: string;
  backendType: string;
  capabilities: StorageCapabilities;
}

export interface SourceRegistryOptions {
  getSecret: SecretResolver;
  timeoutMs: number;
  types?: Record<string, BackendFactory>;
}

const validSlugRegex = /^[a-z0-9][a-z0-9_-]*$/;

export class SourceRegistry {
  private types = new Map<string, BackendFactory>();
  private sources = new Map<string, Source>();
  private getSecret: SecretResolver;
  private timeoutMs: number;

  constructor(opts: SourceRegistryOptions) {
    this.getSecret = opts.getSecret;
    this.timeoutMs = opts.timeoutMs;
    for (const [type, factory] of Object.entries(opts.types ?? {})) {
      this.registerType(type, factory);
    }
  }

  registerType(type: string, factory: BackendFactory): void {
    this.types.set(type, factory);
  }

  backendTypes(): string[] {
    return Array.from(this.types.keys()).sort();
  }

  async register(
    slug: string,
    backendType: string,
    settings: BackendSettings,
    origin: SourceOrigin = "runtime",
  ): Promise<Source> {
    if (!validSlugRegex.test(slug) || slug.length > 64) {
      throw invalidPayloadError(`Invalid source slug: ${slug}`);
    }
    if (this.sources.has(slug)) {
      throw sourceExistsError(slug);
    }
    const backend = await this.instantiate(slug, backendType, settings);
    // Re-check: configure may have yielded to a concurrent register of the same slug
    if (this.sources.has(slug)) {
      throw sourceExistsError(slug);
    }
    const source: Source = {
      slug,
      backendType,
      backend,
      capabilities: { ...backend.describeCapabilities() },
      settings,
      origin,
      timeoutMs: this.timeoutMs,
    };
    this.sources.set(slug, source);
    return source;
  }

  // Settings changes always build a fresh backend instance of the same type.
  async reconfigure(slug: string, settings: BackendSettings): Promise<Source> {
    const current = this.get(slug);
    const backend = await this.instantiate(slug, current.backendType, settings);
    const next: Source = {
      ...current,
      backend,
      capabilities: { ...backend.describeCapabilities() },
      settings,
    };
    this.sources.set(slug, next);
    return next;
  }

  unregister(slug: string): boolean {
    return this.sources.delete(slug);
  }

  has(slug: string): boolean {
    return this.sources.has(slug);
  }

  find(slug: string): Source | undefined {
    return this.sources.get(slug);
  }

  get(slug: string): Source {
    const source = this.sources.get(slug);
    if (!source) throw sourceNotFoundError(slug);
    return source;
  }

  list(): SourceInfo[] {
    return Array.from(this.sources.values())
      .map((s) => ({ slug: s.slug, backendType: s.backendType, capabilities: { ...s.capabilities } }))
      .sort((a, b) => a.slug.localeCompare(b.slug));
  }

  private async instantiate(
    slug: string,
    backendType: string,
    settings: BackendSettings,
  ): Promise<StorageBackend> {
    const factory = this.types.get(backendType);
    if (!factory) {
      throw unknownBackendTypeError(backendType, this.backendTypes());
    }
    const backend = factory();
    try {
      await backend.configure(settings, this.getSecret);
    } catch (err) {
      if (err instanceof AppError && err.code === "CONFIGURATION_ERROR") throw err;
      const msg = err instanceof Error ? err.message : String(err);
      throw configurationError(slug, msg);
    }
    return backend;
  }
}
