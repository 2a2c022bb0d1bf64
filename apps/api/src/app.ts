import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import {
  buildResultArchive,
  DocumentLoadError,
  errorMessage,
  getLogger,
  guessAdapter,
  type Logger,
  processTranscript,
} from "@core";
import type { ApiConfig } from "./config";
import { DownloadStore } from "./downloads";
import { readUploads, type UploadedFile, UploadError } from "./upload";

export interface AppDeps {
  config: ApiConfig;
  downloads?: DownloadStore;
  logger?: Logger;
  now?: () => Date;
}

type BatchEntry =
  | { filename: string; ok: true; token: string; expires_at: string; findings: number; removed: number }
  | { filename: string; ok: false; error: string };

export function createApp(deps: AppDeps) {
  const { config } = deps;
  const downloads = deps.downloads ?? new DownloadStore(config.downloadTtlMs);
  const logger = deps.logger ?? getLogger("api");
  const now = deps.now ?? (() => new Date());
  const limits = { maxFileBytes: config.maxUploadBytes, maxFiles: config.maxFiles };

  const app = express();
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins, exposedHeaders: ["Content-Disposition"] }));
  // Successful responses are not worth a log line
  app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers["x-request-id"];
    res.locals.requestId = typeof header === "string" && header ? header : uuidv4();
    next();
  });

  function sendUploadError(res: Response, e: UploadError) {
    res.status(e.status).json({ error: e.code, message: e.message });
  }

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true, service: "api" });
  });

  // POST /procesar (multipart field "file") -> zip with the cleaned .docx and the report
  app.post("/procesar", async (req: Request, res: Response) => {
    const log = logger.child({ request_id: String(res.locals.requestId) });
    let file: UploadedFile | undefined;
    try {
      const files = await readUploads(req, limits);
      file = files.find((f) => f.field === "file") ?? files[0];
    } catch (e) {
      if (e instanceof UploadError) {
        log.warn("upload.rejected", { error: e.code, message: e.message });
        sendUploadError(res, e);
        return;
      }
      log.error("upload.error", { error: errorMessage(e) });
      res.status(500).json({ error: "internal_error", message: errorMessage(e) });
      return;
    }

    if (!file || !file.filename) {
      res.status(400).json({ error: "file_required", message: "Attach a .docx file in the 'file' field" });
      return;
    }
    if (guessAdapter(file.filename, file.mime) !== "docx") {
      res.status(415).json({ error: "unsupported_file", message: "Only .docx files are supported" });
      return;
    }

    try {
      const out = await processTranscript(file.data, { filename: file.filename, mime: file.mime, now: now() });
      const zip = await buildResultArchive(file.filename, out.cleaned, out.report);
      log.info("procesar.done", { filename: file.filename, findings: out.result.findings.length, removed: out.result.removedTotal });
      res.attachment(out.names.archive);
      res.send(zip);
    } catch (e) {
      if (e instanceof DocumentLoadError) {
        log.warn("procesar.load_failed", { filename: file.filename, error: e.message });
        res.status(422).json({ error: "load_failed", message: `Could not open file: ${e.message}` });
        return;
      }
      log.error("procesar.error", { filename: file.filename, error: errorMessage(e) });
      res.status(500).json({ error: "internal_error", message: errorMessage(e) });
    }
  });

  // POST /procesar-lote (multipart, any number of files) -> one download token per processed file
  app.post("/procesar-lote", async (req: Request, res: Response) => {
    const log = logger.child({ request_id: String(res.locals.requestId) });
    let files: UploadedFile[];
    try {
      files = (await readUploads(req, limits)).filter((f) => f.filename);
    } catch (e) {
      if (e instanceof UploadError) {
        log.warn("upload.rejected", { error: e.code, message: e.message });
        sendUploadError(res, e);
        return;
      }
      log.error("upload.error", { error: errorMessage(e) });
      res.status(500).json({ error: "internal_error", message: errorMessage(e) });
      return;
    }
    if (!files.length) {
      res.status(400).json({ error: "file_required", message: "Attach one or more .docx files" });
      return;
    }

    const results: BatchEntry[] = [];
    try {
      // One file at a time, start to finish.
      for (const f of files) {
        try {
          const out = await processTranscript(f.data, { filename: f.filename, mime: f.mime, now: now() });
          const zip = await buildResultArchive(f.filename, out.cleaned, out.report);
          const { token, expiresAt } = downloads.put(out.names.archive, zip);
          results.push({
            filename: f.filename,
            ok: true,
            token,
            expires_at: expiresAt.toISOString(),
            findings: out.result.findings.length,
            removed: out.result.removedTotal,
          });
        } catch (e) {
          if (!(e instanceof DocumentLoadError)) throw e;
          log.warn("procesar-lote.load_failed", { filename: f.filename, error: e.message });
          results.push({ filename: f.filename, ok: false, error: `Could not open file: ${e.message}` });
        }
      }
    } catch (e) {
      log.error("procesar-lote.error", { error: errorMessage(e) });
      res.status(500).json({ error: "internal_error", message: errorMessage(e) });
      return;
    }
    log.info("procesar-lote.done", { files: files.length, ok: results.filter((r) => r.ok).length });
    res.json({ results });
  });

  app.get("/descargar/:token", (req: Request, res: Response) => {
    const entry = downloads.get(req.params.token);
    if (!entry) {
      logger.debug("download.missing", { token: req.params.token });
      res.status(404).json({ error: "token_not_found", message: "The download link is invalid or has expired" });
      return;
    }
    res.attachment(entry.filename);
    res.send(entry.data);
  });

  return app;
}
