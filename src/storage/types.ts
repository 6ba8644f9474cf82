import { FilesystemBackend } from "./local.js";
import { S3Backend } from "./s3.js";
import type { BackendFactory } from "./storage.js";

// Built-in backend types. Hosts register further factories on the SourceRegistry.
export function builtinBackendTypes(): Record<string, BackendFactory> {
  return {
    filesystem: () => new FilesystemBackend(),
    s3: () => new S3Backend(),
  };
}
