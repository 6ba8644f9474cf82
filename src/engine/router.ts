import express, { Router, type Express } from "express";
import multer from "multer";
import { requireAdmin } from "../auth/middleware.js";
import type { FileHandler } from "./file-handler.js";

export function registerFileRoutes(app: Express, handler: FileHandler, maxUploadSize: number): void {
  const api = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadSize, files: 1 } });

  api.use(express.json());

  api.get("/sources", handler.listSources);
  api.post("/sources", requireAdmin(), handler.createSource);
  api.delete("/sources/:slug", requireAdmin(), handler.removeSource);
  api.post("/sources/:slug/sync", requireAdmin(), handler.syncSource);

  api.post("/upload/:source/complete", handler.completeUpload);
  api.post("/upload/:source", upload.single("file"), handler.upload);

  // Fixed paths before /:id
  api.get("/search", handler.search);
  api.get("/batch", handler.batch);

  api.get("/:id", handler.get);
  api.get("/:id/download", handler.download);
  api.get("/:id/thumbnail", handler.thumbnail);
  api.put("/:id/annotation", handler.annotate);
  api.delete("/:id", handler.delete);

  app.use("/api/_files", api);
}
