import "dotenv/config";
import { loadConfig } from "./config/index.js";
import { buildApp, createCore } from "./server.js";
import { bootstrap } from "./store/bootstrap.js";
import { Store } from "./store/postgres.js";

async function main() {
  // 1. Load config
  const cfg = loadConfig();
  console.log(`Config loaded (port: ${cfg.server.port}, db: ${cfg.database.driver}/${cfg.database.name})`);

  // 2. Connect and create the file tables
  const store = await Store.connect(cfg.database);
  await bootstrap(store);
  console.log(`Database ready (${store.dialect.name()})`);

  // 3. Register sources: configured ones first, then those created at runtime
  const core = createCore(store, cfg);
  const report = await core.sourceStore.load(core.sources, cfg.sources);
  console.log(`Sources loaded: ${report.registered.join(", ") || "none"}`);
  if (report.failed.length > 0) {
    console.warn(`WARN: ${report.failed.length} source(s) failed to load: ${report.failed.map((f) => f.slug).join(", ")}`);
  }

  // 4. HTTP
  const app = buildApp(core, cfg);
  core.scheduler.start();

  const port = cfg.server.port;
  const server = app.listen(port, () => {
    console.log(`Starting server on :${port}`);
  });

  const shutdown = () => {
    core.scheduler.stop();
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (err) => {
          console.error("ERROR: closing database:", err);
          process.exit(1);
        },
      );
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
