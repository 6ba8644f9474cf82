import type { SourceConfig } from "../config/index.js";
import { AppError, conflictError, configurationError, sourceNotFoundError } from "../engine/errors.js";
import type { FileRegistry } from "../files/registry.js";
import type { BackendSettings } from "../storage/storage.js";
import type { Store } from "../store/postgres.js";
import { exec, jsonObject, queryRows, text, UniqueViolationError } from "../store/postgres.js";
import type { Source, SourceOrigin, SourceRegistry } from "./registry.js";

export interface PersistedSource {
  slug: string;
  backendType: string;
  settings: BackendSettings;
  origin: SourceOrigin;
}

export interface LoadFailure {
  slug: string;
  error: AppError;
}

export interface LoadReport {
  registered: string[];
  failed: LoadFailure[];
}

function toAppError(slug: string, err: unknown): AppError {
  if (err instanceof AppError) return err;
  return configurationError(slug, err instanceof Error ? err.message : String(err));
}

/**
 * SourceStore persists source definitions in _file_sources. Sources declared
 * in configuration are upserted on every start; runtime sources exist only
 * as rows.
 */
export class SourceStore {
  private store: Store;
  private files: FileRegistry;

  constructor(store: Store, files: FileRegistry) {
    this.store = store;
    this.files = files;
  }

  async list(): Promise<PersistedSource[]> {
    const rows = await queryRows(
      this.store.pool,
      "SELECT slug, backend_type, config, origin FROM _file_sources ORDER BY slug",
    );
    return rows.map((row) => ({
      slug: text(row, "slug"),
      backendType: text(row, "backend_type"),
      settings: jsonObject(row, "config"),
      origin: text(row, "origin") === "config" ? "config" : "runtime",
    }));
  }

  async load(registry: SourceRegistry, staticSources: Record<string, SourceConfig>): Promise<LoadReport> {
    const persisted = new Map((await this.list()).map((p) => [p.slug, p]));

    // A slug cannot be both: refuse to start rather than pick one
    for (const slug of Object.keys(staticSources)) {
      if (persisted.get(slug)?.origin === "runtime") {
        throw configurationError(slug, "declared in configuration but already exists as a runtime source");
      }
    }

    const report: LoadReport = { registered: [], failed: [] };
    const fail = (slug: string, err: unknown) => {
      const error = toAppError(slug, err);
      console.error(`ERROR: source ${slug} not loaded: ${error.message}`);
      report.failed.push({ slug, error });
    };

    for (const [slug, def] of Object.entries(staticSources)) {
      const previous = persisted.get(slug);
      if (previous && previous.backendType !== def.storage) {
        fail(
          slug,
          configurationError(slug, `backend type changed from ${previous.backendType} to ${def.storage}`),
        );
        continue;
      }
      try {
        await registry.register(slug, def.storage, def.config, "config");
      } catch (err) {
        fail(slug, err);
        continue;
      }
      try {
        await this.upsertStatic(slug, def);
        report.registered.push(slug);
      } catch (err) {
        registry.unregister(slug);
        fail(slug, err);
      }
    }

    for (const row of persisted.values()) {
      if (row.origin !== "runtime") continue;
      try {
        await registry.register(row.slug, row.backendType, row.settings, "runtime");
        report.registered.push(row.slug);
      } catch (err) {
        fail(row.slug, err);
      }
    }

    return report;
  }

  async create(
    registry: SourceRegistry,
    slug: string,
    backendType: string,
    settings: BackendSettings,
  ): Promise<Source> {
    const source = await registry.register(slug, backendType, settings, "runtime");
    try {
      await exec(
        this.store.pool,
        `INSERT INTO _file_sources (slug, backend_type, config, origin, created_at)
         VALUES ($1, $2, $3, 'runtime', $4)`,
        [slug, backendType, settings, new Date().toISOString()],
      );
    } catch (err) {
      registry.unregister(slug);
      if (err instanceof UniqueViolationError) {
        throw conflictError(`Source ${slug} is already persisted`);
      }
      throw err;
    }
    console.log(`Created runtime source ${slug} (${backendType})`);
    return source;
  }

  async remove(registry: SourceRegistry, slug: string): Promise<void> {
    const source = registry.get(slug);
    if (source.origin !== "runtime") {
      throw conflictError(`Source ${slug} is declared in configuration and cannot be removed`);
    }
    const count = await this.files.countBySource(slug);
    if (count > 0) {
      throw conflictError(`Source ${slug} still has ${count} file(s)`);
    }
    const n = await exec(this.store.pool, "DELETE FROM _file_sources WHERE slug = $1", [slug]);
    if (n === 0) throw sourceNotFoundError(slug);
    registry.unregister(slug);
    console.log(`Removed runtime source ${slug}`);
  }

  private async upsertStatic(slug: string, def: SourceConfig): Promise<void> {
    await exec(
      this.store.pool,
      `INSERT INTO _file_sources (slug, backend_type, config, origin, created_at)
       VALUES ($1, $2, $3, 'config', $4)
       ON CONFLICT (slug) DO UPDATE SET config = EXCLUDED.config, origin = 'config'`,
      [slug, def.storage, def.config, new Date().toISOString()],
    );
  }
}
