import fs from "node:fs";
import path from "node:path";
import type { Writable } from "node:stream";

export const LOG_PREFIX = "[voxbridge]";

export interface Logger {
  log(message: string): void;
}

export type LoggerOptions = {
  /** Append timestamped lines to `filePath`. */
  debug?: boolean;
  filePath?: string;
  /** Mirror lines to `stream` with the `[voxbridge]` prefix. */
  verbose?: boolean;
  stream?: Writable;
  now?: () => Date;
};

export const silentLogger: Logger = {
  log: () => {},
};

export function formatClockStamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function debugFilePath(
  debugDir: string,
  scriptPath: string | undefined,
  kind: "log" | "stderr",
  pid: number,
): string {
  const base = scriptPath ? path.basename(scriptPath) : "voxbridge";
  return path.join(debugDir, `${base}.${kind}.${pid}`);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const stream = options.stream ?? process.stderr;
  const filePath = options.debug ? options.filePath : undefined;

  if (!filePath && !options.verbose) {
    return silentLogger;
  }

  return {
    log(message: string): void {
      if (options.verbose) {
        stream.write(`${LOG_PREFIX} ${message}\n`);
      }
      if (!filePath) {
        return;
      }
      try {
        fs.appendFileSync(filePath, `${formatClockStamp(now())} ${message}\n`, "utf8");
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        stream.write(`${LOG_PREFIX} cannot write debug log ${filePath}: ${reason}\n`);
      }
    },
  };
}

/** Lifecycle failures are reported regardless of the debug setting. */
export function reportFatal(
  logger: Logger,
  message: string,
  stream: Writable = process.stderr,
): void {
  logger.log(message);
  stream.write(`${LOG_PREFIX} ${message}\n`);
}
