import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type Logger = pino.Logger;

const LEVEL_NAMES: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

function getModuleName(module: string | ImportMeta): string {
  const moduleUrl = typeof module === "string" ? module : module.url;
  const fileName = moduleUrl.substring(moduleUrl.lastIndexOf("/") + 1);
  const dot = fileName.indexOf(".");
  return dot > 0 ? fileName.substring(0, dot) : fileName;
}

function formatTime(timestamp: number): string {
  return new Date(timestamp).toISOString().replace("T", " ").substring(0, 19);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// stdout is reserved for the YAML report, so log lines go to stderr.
function stderrDestination(): pino.DestinationStream {
  return {
    write(chunk: string): void {
      let parsed: unknown;
      try {
        parsed = JSON.parse(chunk);
      } catch {
        process.stderr.write(chunk);
        return;
      }
      if (!isRecord(parsed)) {
        process.stderr.write(chunk);
        return;
      }
      const time = typeof parsed.time === "number" ? formatTime(parsed.time) : "";
      const level = typeof parsed.level === "number" ? (LEVEL_NAMES[parsed.level] ?? "LOG") : "LOG";
      const moduleName = typeof parsed.module === "string" ? parsed.module : "unknown";
      const msg = typeof parsed.msg === "string" ? parsed.msg : "";
      const err =
        isRecord(parsed.err) && typeof parsed.err.message === "string"
          ? `: ${parsed.err.message}`
          : "";
      process.stderr.write(`[${time}] ${level} ${moduleName} - ${msg}${err}\n`);
    },
  };
}

function resolveLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  switch (level) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "fatal":
    case "silent":
      return level;
    default:
      return "info";
  }
}

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: resolveLevel() }, stderrDestination());
  }
  return rootLogger;
}

/**
 * Get a logger for the calling module, named after its file. Call `getLog(import.meta)` near
 * the top of the module.
 */
export function getLog(module: string | ImportMeta): Logger {
  return getRootLogger().child({ module: getModuleName(module) });
}
