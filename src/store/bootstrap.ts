import type { Store } from "./postgres.js";

// bootstrap creates the source and file registry tables if they are missing.
export async function bootstrap(store: Store): Promise<void> {
  await store.execScript(store.dialect.fileTablesSQL());
}
