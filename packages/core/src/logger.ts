export type Level = "trace" | "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface LogEntry extends LogContext {
  ts: string;
  level: Level;
  msg: string;
  service?: string;
}

interface LogOptions {
  level?: Level;
  format?: "json" | "pretty";
  // Receives every emitted entry instead of stderr (tests, embedding hosts).
  sink?: (entry: LogEntry, line: string) => void;
}

export interface Logger {
  child(ctx: LogContext): Logger;
  trace(msg: string, ctx?: LogContext): void;
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVELS: Level[] = ["trace", "debug", "info", "warn", "error"];

function levelIndex(l: Level): number { return LEVELS.indexOf(l); }

function isLevel(v: string | undefined): v is Level {
  return v !== undefined && (LEVELS as string[]).includes(v);
}

function nowISO() { return new Date().toISOString(); }

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const lvl: Level = opts.level ?? (isLevel(envLevel) ? envLevel : "info");
  const fmt = opts.format ?? (process.env.LOG_FORMAT === "json" ? "json" : "pretty");

  function format(entry: LogEntry): string {
    if (fmt === "json") return JSON.stringify(entry);
    const { ts, level, msg, service: svc, ...ctx } = entry;
    const head = `[${ts}] ${level.toUpperCase()}${svc ? ` ${svc}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    return `${head} - ${msg}${ctxStr}`;
  }

  function create(base: LogContext): Logger {
    function emit(level: Level, msg: string, extra?: LogContext) {
      if (levelIndex(level) < levelIndex(lvl)) return;
      const entry: LogEntry = { ts: nowISO(), level, msg, service, ...base, ...(extra ?? {}) };
      const line = format(entry);
      if (opts.sink) {
        opts.sink(entry, line);
        return;
      }
      // stdout is reserved for command output
      // eslint-disable-next-line no-console
      console.error(line);
    }

    return {
      child(ctx) { return create({ ...base, ...ctx }); },
      trace(msg, ctx) { emit("trace", msg, ctx); },
      debug(msg, ctx) { emit("debug", msg, ctx); },
      info(msg, ctx) { emit("info", msg, ctx); },
      warn(msg, ctx) { emit("warn", msg, ctx); },
      error(msg, ctx) { emit("error", msg, ctx); },
    };
  }

  return create({});
}
