import { AppError, backendUnavailableError, capabilityMismatchError } from "../engine/errors.js";
import type { BackendCallOptions, StorageCapabilities } from "../storage/storage.js";
import type { Source } from "./registry.js";

type CapabilityFlag = {
  [K in keyof StorageCapabilities]: StorageCapabilities[K] extends boolean ? K : never;
}[keyof StorageCapabilities];

/** Throws CapabilityMismatch unless the source declares the flag. */
export function requireCapability(source: Source, flag: CapabilityFlag, operation: string): void {
  if (!source.capabilities[flag]) {
    throw capabilityMismatchError(source.slug, operation);
  }
}

/**
 * callBackend runs one backend operation under the source's own timeout.
 * The signal handed to fn is aborted on timeout. AppErrors raised by the
 * backend pass through; anything else is reported as BackendUnavailable.
 */
export async function callBackend<T>(
  source: Source,
  operation: string,
  fn: (opts: BackendCallOptions) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const pending: Promise<T>[] = [fn({ signal: controller.signal })];
  if (source.timeoutMs > 0) {
    pending.push(
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          // Settle first so the timeout, not the aborted call's own error, wins the race
          reject(backendUnavailableError(source.slug, operation, `timed out after ${source.timeoutMs}ms`));
          controller.abort();
        }, source.timeoutMs);
      }),
    );
  }

  try {
    return await Promise.race(pending);
  } catch (err) {
    if (err instanceof AppError) throw err;
    const cause = err instanceof Error ? err.message : String(err);
    throw backendUnavailableError(source.slug, operation, cause);
  } finally {
    clearTimeout(timer);
  }
}
