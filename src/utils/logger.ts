import * as fs from "fs";
import * as fsp from "fs/promises";
import * as os from "os";
import * as path from "path";

enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export function resolveAppLogDir(): string {
  const configured = process.env.FENCE_AGENT_LOG_DIR?.trim();
  if (configured) {
    return configured;
  }
  return path.join(os.homedir(), ".fence-stream-agent", "logs");
}

async function log(level: LogLevel, message: string, ...args: unknown[]) {
  const logDir = resolveAppLogDir();
  if (!fs.existsSync(logDir)) {
    await fsp.mkdir(logDir, { recursive: true });
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level}] ${message}`;
  await fsp.appendFile(path.join(logDir, "app.log"), logMessage + "\n");

  // Errors always reach the console; the rest only outside production.
  if (level === LogLevel.ERROR || process.env.NODE_ENV !== "production") {
    console.log(logMessage, ...args);
  }
}

export const logger = {
  debug: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.DEBUG, message, ...args),
  info: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.INFO, message, ...args),
  warn: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.WARN, message, ...args),
  error: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.ERROR, message, ...args),
};
