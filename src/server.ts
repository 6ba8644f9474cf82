import express, { type Express } from "express";
import morgan from "morgan";
import { accessPredicate, type Caller } from "./auth/auth.js";
import { optionalAuth } from "./auth/middleware.js";
import type { Config } from "./config/index.js";
import { envSecretResolver } from "./config/index.js";
import { FileHandler } from "./engine/file-handler.js";
import { registerFileRoutes } from "./engine/router.js";
import { DownloadResolver } from "./files/download.js";
import { FileRegistry } from "./files/registry.js";
import { ReconcileScheduler } from "./files/scheduler.js";
import { PermissionScope, type AccessPredicate } from "./files/scope.js";
import { FileService } from "./files/service.js";
import { UploadOrchestrator } from "./files/upload.js";
import { errorHandler } from "./middleware/error-handler.js";
import { SourceRegistry } from "./sources/registry.js";
import { SourceStore } from "./sources/store.js";
import type { BackendFactory, SecretResolver } from "./storage/storage.js";
import { builtinBackendTypes } from "./storage/types.js";
import type { Store } from "./store/postgres.js";

export interface FileCore {
  sources: SourceRegistry;
  sourceStore: SourceStore;
  files: FileRegistry;
  uploads: UploadOrchestrator;
  downloads: DownloadResolver;
  service: FileService;
  scope: PermissionScope<Caller>;
  scheduler: ReconcileScheduler;
}

export interface CoreOptions {
  getSecret?: SecretResolver;
  /** Extra backend types on top of the built-in ones. */
  types?: Record<string, BackendFactory>;
  isAllowed?: AccessPredicate<Caller>;
}

// createCore wires the registries and services over one database. Sources are not loaded here.
export function createCore(store: Store, cfg: Config, opts: CoreOptions = {}): FileCore {
  const sources = new SourceRegistry({
    getSecret: opts.getSecret ?? envSecretResolver(),
    timeoutMs: cfg.storage.backend_timeout_ms,
    types: { ...builtinBackendTypes(), ...opts.types },
  });
  const files = new FileRegistry(store, sources);
  return {
    sources,
    sourceStore: new SourceStore(store, files),
    files,
    uploads: new UploadOrchestrator({
      sources,
      files,
      maxFileSize: cfg.storage.max_file_size,
      ticketSecret: cfg.upload_ticket_secret,
      ticketTtl: cfg.storage.upload_ticket_ttl,
    }),
    downloads: new DownloadResolver(sources, cfg.storage.signed_url_ttl),
    service: new FileService(sources, files),
    scope: new PermissionScope(sources, files, opts.isAllowed ?? accessPredicate(cfg.access)),
    scheduler: new ReconcileScheduler(sources, files, cfg.storage.sweep_interval_ms, cfg.storage.sweep_grace_ms),
  };
}

export function buildApp(core: FileCore, cfg: Config, opts: { requestLog?: boolean } = {}): Express {
  const app = express();
  if (opts.requestLog ?? true) {
    app.use(
      morgan(":date[clf] :status :method :url :response-time ms", {
        stream: { write: (msg: string) => process.stdout.write(msg) },
      }),
    );
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(optionalAuth(cfg.jwt_secret));
  registerFileRoutes(app, new FileHandler(core), cfg.storage.max_file_size);

  // Must be last
  app.use(errorHandler(cfg.storage.max_file_size));
  return app;
}
