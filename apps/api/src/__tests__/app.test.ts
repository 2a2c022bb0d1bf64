import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import JSZip from "jszip";
import { getLogger } from "@core";
import { buildDocx } from "../../../../test/fixtures/docx";
import { createApp } from "../app";
import type { ApiConfig } from "../config";
import { DownloadStore } from "../downloads";

const NOW = new Date("2026-05-04T09:00:00.000Z");

const baseConfig: ApiConfig = {
  port: 0,
  corsOrigins: ["http://localhost:3000"],
  downloadTtlMs: 300_000,
  maxUploadBytes: 1024 * 1024,
  maxFiles: 5,
};

let clock: number;
let downloads: DownloadStore;

function makeApp(config: Partial<ApiConfig> = {}) {
  return createApp({
    config: { ...baseConfig, ...config },
    downloads,
    logger: getLogger("api", { level: "error", sink: () => undefined }),
    now: () => NOW,
  });
}

async function sampleDocx(): Promise<Buffer> {
  return buildDocx([
    [
      { text: "ENTREVISTADOR:", bold: true, font: "Arial", size: 12 },
      { text: " ¿Qué opinas?", font: "Arial", size: 12 },
    ],
    [{ text: "ENTREVISTADO: Bien :)", font: "Arial", size: 12 }],
  ]);
}

beforeEach(() => {
  clock = 0;
  downloads = new DownloadStore(baseConfig.downloadTtlMs, () => clock);
});

describe("GET /health", () => {
  it("reports ok", async () => {
    const res = await request(makeApp()).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, service: "api" });
  });
});

describe("POST /procesar", () => {
  it("returns a zip with the cleaned document and the report", async () => {
    const res = await request(makeApp())
      .post("/procesar")
      .attach("file", await sampleDocx(), "entrevista.docx")
      .responseType("blob");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("application/zip");
    expect(res.headers["content-disposition"]).toBe('attachment; filename="resultado_entrevista.docx.zip"');

    const body: Buffer = res.body;
    const zip = await JSZip.loadAsync(body);
    expect(Object.keys(zip.files).sort()).toEqual(["entrevista_errores.txt", "entrevista_limpio.docx"]);
    const report = await zip.file("entrevista_errores.txt")?.async("string");
    expect(report?.split("\n").slice(0, 6)).toEqual([
      "📋 ERROR REPORT",
      "File: entrevista.docx",
      "Generated: 2026-05-04T09:00:00.000Z",
      "",
      "Line 1: Bold formatting → The text of 'ENTREVISTADOR:' should be entirely bold.",
      "",
    ]);
  });

  it("requires a file", async () => {
    const res = await request(makeApp()).post("/procesar").field("nota", "sin archivo");
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("file_required");
  });

  it("rejects requests that are not multipart", async () => {
    const res = await request(makeApp()).post("/procesar").send({ file: "x" });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("invalid_content_type");
  });

  it("rejects other file types", async () => {
    const res = await request(makeApp()).post("/procesar").attach("file", Buffer.from("%PDF-1.4"), "notas.pdf");
    expect(res.status).toBe(415);
    expect(res.body.error).toBe("unsupported_file");
  });

  it("reports files that cannot be opened", async () => {
    const res = await request(makeApp()).post("/procesar").attach("file", Buffer.from("hola"), "roto.docx");
    expect(res.status).toBe(422);
    expect(res.body).toEqual({ error: "load_failed", message: "Could not open file: File is not a valid .docx container" });
  });

  it("rejects uploads over the size limit", async () => {
    const res = await request(makeApp({ maxUploadBytes: 16 }))
      .post("/procesar")
      .attach("file", await sampleDocx(), "grande.docx");
    expect(res.status).toBe(413);
    expect(res.body.error).toBe("file_too_large");
  });
});

describe("POST /procesar-lote and GET /descargar/:token", () => {
  it("processes each file independently and hands out download tokens", async () => {
    const app = makeApp();
    const res = await request(app)
      .post("/procesar-lote")
      .attach("files", await sampleDocx(), "uno.docx")
      .attach("files", Buffer.from("no es un docx"), "dos.docx");

    expect(res.status).toBe(200);
    const [first, second] = res.body.results;
    expect(first).toMatchObject({ filename: "uno.docx", ok: true, findings: 1, removed: 1, expires_at: "1970-01-01T00:05:00.000Z" });
    expect(second).toEqual({ filename: "dos.docx", ok: false, error: "Could not open file: File is not a valid .docx container" });

    const download = await request(app).get(`/descargar/${first.token}`).responseType("blob");
    expect(download.status).toBe(200);
    expect(download.headers["content-disposition"]).toBe('attachment; filename="resultado_uno.docx.zip"');
    const zip = await JSZip.loadAsync(download.body);
    expect(Object.keys(zip.files).sort()).toEqual(["uno_errores.txt", "uno_limpio.docx"]);

    clock = baseConfig.downloadTtlMs;
    const expired = await request(app).get(`/descargar/${first.token}`);
    expect(expired.status).toBe(404);
    expect(expired.body.error).toBe("token_not_found");
  });

  it("requires at least one file", async () => {
    const res = await request(makeApp()).post("/procesar-lote").field("nota", "vacío");
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("file_required");
  });
});

describe("CORS", () => {
  it("only allows configured origins", async () => {
    const app = makeApp();
    const allowed = await request(app).get("/health").set("Origin", "http://localhost:3000");
    expect(allowed.headers["access-control-allow-origin"]).toBe("http://localhost:3000");

    const denied = await request(app).get("/health").set("Origin", "https://evil.example");
    expect(denied.headers["access-control-allow-origin"]).toBeUndefined();
  });
});
