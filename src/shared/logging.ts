import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

const LOGGER_NAME = "ews-mcp";

export function redactSecrets(input: string): string {
  return input
    .replace(/\bsk-[A-Za-z0-9_-]{16,}\b/g, "[REDACTED]")
    .replace(/\b(LLM_API_KEY)\s*=\s*([^\s]+)/gi, (_match, name: string) => `${name}=[REDACTED]`)
    .replace(
      /\b(LLM_API_KEY|apiKey)\b(["']?)\s*:\s*["']([^"']+)["']/gi,
      (_match, name: string, quote: string) => `${name}${quote}:"[REDACTED]"`
    );
}

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isLogFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        process.stderr.write(redactSecrets(messageOf(line)) + "\n");
      }
      cb();
    },
  });
}

function messageOf(line: string): string {
  try {
    const o: unknown = JSON.parse(line);
    if (o && typeof o === "object" && "msg" in o && typeof o.msg === "string") return o.msg;
    return line;
  } catch {
    return line;
  }
}

let rootLogger: pino.Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): void {
  const logLevel = isLogLevel(level) ? level : "info";
  if (format === "plain") {
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, plainMessageStderr());
  } else {
    const dest = redactingStderr();
    if (format === "text") {
      const prettyStream = pinoPretty({ colorize: true, destination: dest });
      rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, prettyStream);
    } else {
      rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, dest);
    }
  }
}

function ensureLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: "info", name: LOGGER_NAME }, plainMessageStderr());
  }
  return rootLogger;
}

export function getLogger(): pino.Logger {
  return ensureLogger();
}

export const log = {
  info: (...args: Parameters<pino.Logger["info"]>) => ensureLogger().info(...args),
  warn: (...args: Parameters<pino.Logger["warn"]>) => ensureLogger().warn(...args),
  error: (...args: Parameters<pino.Logger["error"]>) => ensureLogger().error(...args),
  debug: (...args: Parameters<pino.Logger["debug"]>) => ensureLogger().debug(...args),
  trace: (...args: Parameters<pino.Logger["trace"]>) => ensureLogger().trace(...args),
};
