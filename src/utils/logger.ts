export type Level = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly Level[] = ["debug", "info", "warn", "error"];

type Meta = Record<string, unknown>;
type LogFn = (msg: string, meta?: Meta) => void;
type Sink = (line: string) => void;

export type Logger = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  /** Same sink and level; `bindings` are added to every line. */
  child: (bindings: Meta) => Logger;
};

// eslint-disable-next-line no-console
const consoleSink: Sink = (line) => console.log(line);

export function createLogger(level: Level, sink: Sink = consoleSink, bindings: Meta = {}): Logger {
  const levels: Record<Level, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
  };
  const threshold = levels[level] ?? 20;

  const log = (lvl: Level, msg: string, meta?: Meta) => {
    if (levels[lvl] < threshold) return;
    sink(
      JSON.stringify({
        level: lvl,
        msg,
        time: new Date().toISOString(),
        ...bindings,
        ...meta,
      })
    );
  };

  return {
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (extra) => createLogger(level, sink, { ...bindings, ...extra }),
  };
}
