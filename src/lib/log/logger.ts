// /src/lib/log/logger.ts
//
// Console logging with a "[TAG]" prefix per subsystem.

export type LogFn = (message: string, meta?: unknown) => void;

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export type LogSink = Pick<Console, "log" | "warn" | "error">;

function write(fn: (...args: unknown[]) => void, prefix: string, message: string, meta: unknown) {
  if (meta === undefined) fn(`${prefix} ${message}`);
  else fn(`${prefix} ${message}`, meta);
}

export function createLogger(tag: string, sink: LogSink = console): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (message, meta) => write(sink.log.bind(sink), prefix, message, meta),
    warn: (message, meta) => write(sink.warn.bind(sink), prefix, message, meta),
    error: (message, meta) => write(sink.error.bind(sink), prefix, message, meta),
  };
}
