export interface ApiConfig {
  port: number;
  corsOrigins: string[];
  downloadTtlMs: number;
  maxUploadBytes: number;
  maxFiles: number;
}

const DEFAULT_CORS_ORIGINS = ["http://localhost:3000", "http://127.0.0.1:3000"];

function num(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const origins = (env.CORS_ORIGINS ?? "")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);
  return {
    port: num(env.API_PORT, 3001),
    corsOrigins: origins.length ? origins : DEFAULT_CORS_ORIGINS,
    downloadTtlMs: num(env.DOWNLOAD_TTL_MS, 5 * 60 * 1000),
    maxUploadBytes: num(env.MAX_UPLOAD_BYTES, 20 * 1024 * 1024),
    maxFiles: num(env.MAX_FILES, 20),
  };
}
