export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Returns a logger that adds `bindings` to every line. */
  child(bindings: LogMeta): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Output sink; defaults to stderr so stdout stays free for piping. */
  output?: (line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    pretty = process.env.NODE_ENV !== "production",
    output = writeStderr,
  } = options;

  const minRank = LEVEL_RANK[level];

  function format(msgLevel: LogLevel, msg: string, meta: LogMeta): string {
    const ts = new Date().toISOString();
    if (!pretty) {
      return JSON.stringify({ ts, level: msgLevel, msg, ...meta });
    }
    const entries = Object.entries(meta);
    const metaStr = entries.length
      ? " " + entries.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ")
      : "";
    return `[${ts}] ${msgLevel.toUpperCase().padEnd(5)} ${msg}${metaStr}`;
  }

  function build(bindings: LogMeta): Logger {
    const write = (msgLevel: LogLevel, msg: string, meta?: LogMeta) => {
      if (LEVEL_RANK[msgLevel] < minRank) return;
      output(format(msgLevel, msg, { ...bindings, ...meta }));
    };

    return {
      debug: (msg, meta) => write("debug", msg, meta),
      info: (msg, meta) => write("info", msg, meta),
      warn: (msg, meta) => write("warn", msg, meta),
      error: (msg, meta) => write("error", msg, meta),
      child: (extra) => build({ ...bindings, ...extra }),
    };
  }

  return build({});
}

/** A logger that drops everything; the default for library calls without one. */
export const silentLogger: Logger = createLogger({ level: "error", output: () => {} });
