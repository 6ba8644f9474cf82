import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import type { DriverName } from "../store/dialect.js";

export interface ServerConfig {
  port: number;
}

export interface DatabaseConfig {
  driver: DriverName;
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  pool_size: number;
  data_dir: string;
}

export interface StorageConfig {
  max_file_size: number;
  backend_timeout_ms: number;
  signed_url_ttl: number;
  upload_ticket_ttl: number;
  sweep_interval_ms: number;
  sweep_grace_ms: number;
}

export interface SourceConfig {
  storage: string;
  config: Record<string, unknown>;
}

export interface Config {
  server: ServerConfig;
  database: DatabaseConfig;
  storage: StorageConfig;
  sources: Record<string, SourceConfig>;
  // slug -> roles allowed to read it; "*" admits anyone, "default" covers unlisted slugs
  access: Record<string, string[]>;
  jwt_secret: string;
  upload_ticket_secret: string;
}

type RawMap = Record<string, unknown>;

function isMap(v: unknown): v is RawMap {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function section(raw: RawMap, key: string): RawMap {
  const v = raw[key];
  return isMap(v) ? v : {};
}

function str(v: unknown, fallback: string): string {
  return typeof v === "string" && v !== "" ? v : fallback;
}

function num(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isFinite(v) ? v : fallback;
}

function strList(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}

function parseSources(raw: RawMap): Record<string, SourceConfig> {
  const out: Record<string, SourceConfig> = {};
  for (const [slug, def] of Object.entries(section(raw, "sources"))) {
    if (!isMap(def)) continue;
    out[slug] = {
      storage: str(def.storage, ""),
      config: section(def, "config"),
    };
  }
  return out;
}

function parseAccess(raw: RawMap): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [slug, roles] of Object.entries(section(raw, "access"))) {
    out[slug] = strList(roles);
  }
  return out;
}

export function readConfigFile(candidates: string[]): RawMap {
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      const loaded = yaml.load(fs.readFileSync(p, "utf-8"));
      return isMap(loaded) ? loaded : {};
    }
  }
  return {};
}

// An object younger than its upload ticket may still be confirmed, so the sweeper must not take it.
function sweepGrace(raw: number, ticketTtlSeconds: number): number {
  const floor = ticketTtlSeconds * 1000;
  if (raw >= floor) return raw;
  console.warn(`WARN: storage.sweep_grace_ms ${raw} is shorter than the upload ticket lifetime; using ${floor}`);
  return floor;
}

export function parseConfig(raw: RawMap): Config {
  const server = section(raw, "server");
  const database = section(raw, "database");
  const storage = section(raw, "storage");
  const ticketTtl = num(storage.upload_ticket_ttl, 3600);

  return {
    server: {
      port: num(server.port, 8080),
    },
    jwt_secret: str(raw.jwt_secret, "changeme-secret"),
    upload_ticket_secret: str(raw.upload_ticket_secret, "changeme-upload-secret"),
    storage: {
      max_file_size: num(storage.max_file_size, 104857600),
      backend_timeout_ms: num(storage.backend_timeout_ms, 30_000),
      signed_url_ttl: num(storage.signed_url_ttl, 300),
      upload_ticket_ttl: ticketTtl,
      sweep_interval_ms: num(storage.sweep_interval_ms, 0),
      sweep_grace_ms: sweepGrace(num(storage.sweep_grace_ms, 24 * 60 * 60 * 1000), ticketTtl),
    },
    database: {
      driver: database.driver === "postgres" ? "postgres" : "sqlite",
      host: str(database.host, "localhost"),
      port: num(database.port, 5432),
      user: str(database.user, "filekeep"),
      password: str(database.password, "filekeep"),
      name: str(database.name, "filekeep"),
      pool_size: num(database.pool_size, 10),
      data_dir: str(database.data_dir, "./data"),
    },
    sources: parseSources(raw),
    access: parseAccess(raw),
  };
}

export function loadConfig(): Config {
  return parseConfig(
    readConfigFile([path.resolve("filekeep.yaml"), path.resolve("../../filekeep.yaml")]),
  );
}

// Secrets are looked up by name; the host may supply its own resolver.
export function envSecretResolver(env: NodeJS.ProcessEnv = process.env) {
  return (name: string): string | undefined => env[name];
}
