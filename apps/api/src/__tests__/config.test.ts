import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      corsOrigins: ["http://localhost:3000", "http://127.0.0.1:3000"],
      downloadTtlMs: 300000,
      maxUploadBytes: 20971520,
      maxFiles: 20,
    });
  });

  it("reads overrides and ignores unusable numbers", () => {
    const config = loadConfig({
      API_PORT: "8080",
      CORS_ORIGINS: " https://a.example , https://b.example,",
      DOWNLOAD_TTL_MS: "abc",
      MAX_UPLOAD_BYTES: "-5",
      MAX_FILES: "3",
    });
    expect(config).toEqual({
      port: 8080,
      corsOrigins: ["https://a.example", "https://b.example"],
      downloadTtlMs: 300000,
      maxUploadBytes: 20971520,
      maxFiles: 3,
    });
  });
});
