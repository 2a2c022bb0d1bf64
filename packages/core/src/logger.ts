type Level = "trace" | "debug" | "info" | "warn" | "error";
type Format = "json" | "pretty";

export type LogContext = Record<string, unknown>;

interface BaseCtx {
  service?: string;
  request_id?: string;
  filename?: string;
}

interface LogOptions {
  level?: Level;
  format?: Format;
  sink?: (line: string) => void;
}

export interface Logger {
  child(ctx: BaseCtx): Logger;
  trace(msg: string, ctx?: LogContext): void;
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVELS: Level[] = ["trace", "debug", "info", "warn", "error"];

function levelIndex(l: Level): number { return LEVELS.indexOf(l); }

function isLevel(v: unknown): v is Level {
  return typeof v === "string" && (LEVELS as string[]).includes(v);
}

function nowISO() { return new Date().toISOString(); }

// eslint-disable-next-line no-console
const consoleSink = (line: string) => console.log(line);

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const env = process.env;
  const lvl: Level = opts.level ?? (isLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info");
  const fmt: Format = opts.format ?? (env.LOG_FORMAT === "json" ? "json" : "pretty");
  const sink = opts.sink ?? consoleSink;

  function emit(base: BaseCtx, level: Level, msg: string, extra?: LogContext) {
    if (levelIndex(level) < levelIndex(lvl)) return;
    if (fmt === "json") {
      sink(JSON.stringify({ ts: nowISO(), level, msg, ...base, ...(extra || {}) }));
      return;
    }
    const { service: svc, ...rest } = base;
    const ctx: LogContext = { ...rest, ...(extra || {}) };
    const head = `[${nowISO()}] ${level.toUpperCase()}${svc ? ` ${svc}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    sink(`${head} - ${msg}${ctxStr}`);
  }

  function create(base: BaseCtx): Logger {
    return {
      child(ctx: BaseCtx) { return create({ ...base, ...ctx }); },
      trace(msg, ctx) { emit(base, "trace", msg, ctx); },
      debug(msg, ctx) { emit(base, "debug", msg, ctx); },
      info(msg, ctx) { emit(base, "info", msg, ctx); },
      warn(msg, ctx) { emit(base, "warn", msg, ctx); },
      error(msg, ctx) { emit(base, "error", msg, ctx); },
    };
  }

  return create({ service });
}
