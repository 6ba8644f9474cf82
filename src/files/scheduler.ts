import type { SourceRegistry } from "../sources/registry.js";
import type { FileRegistry } from "./registry.js";
import { sweepOrphans } from "./reconcile.js";

// ReconcileScheduler periodically sweeps orphaned objects from every source that can list and delete.
export class ReconcileScheduler {
  private sources: SourceRegistry;
  private files: FileRegistry;
  private intervalMs: number;
  private graceMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(sources: SourceRegistry, files: FileRegistry, intervalMs: number, graceMs: number) {
    this.sources = sources;
    this.files = files;
    this.intervalMs = intervalMs;
    this.graceMs = graceMs;
  }

  start(): void {
    if (this.intervalMs <= 0 || this.timer) return;
    this.timer = setInterval(() => {
      this.sweepAll().catch((err) => {
        console.error("ERROR: reconcile scheduler:", err);
      });
    }, this.intervalMs);
    this.timer.unref();
    console.log(`Reconcile scheduler started (every ${this.intervalMs}ms)`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async sweepAll(): Promise<void> {
    // Skip a tick that fires while the previous sweep is still going
    if (this.running) return;
    this.running = true;
    try {
      for (const info of this.sources.list()) {
        if (!info.capabilities.canList || !info.capabilities.canDelete) continue;
        try {
          await sweepOrphans(this.sources, this.files, info.slug, { graceMs: this.graceMs });
        } catch (err) {
          console.error(`ERROR: sweep of source ${info.slug}:`, err);
        }
      }
    } finally {
      this.running = false;
    }
  }
}
