import fs from "node:fs";
import type { Readable, Writable } from "node:stream";
import { ConversationUsageError, HandoffError, HandoffTimeoutError } from "./errors.js";

/** File descriptor the invoker opens as a pipe and the worker inherits. */
export const HANDOFF_FD = 3;

export interface HandoffWriter {
  send(url: string): Promise<void>;
}

function oneShot(write: (line: string) => Promise<void>): HandoffWriter {
  let sent = false;
  return {
    async send(url: string): Promise<void> {
      if (sent) {
        throw new ConversationUsageError("Session endpoint was already handed off");
      }
      sent = true;
      await write(`${url}\n`);
    },
  };
}

export function createStreamHandoffWriter(stream: Writable): HandoffWriter {
  return oneShot(async (line) => {
    await new Promise<void>((resolve, reject) => {
      stream.write(line, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    stream.end();
  });
}

export function createFdHandoffWriter(fd: number = HANDOFF_FD): HandoffWriter {
  return oneShot(async (line) => {
    await new Promise<void>((resolve, reject) => {
      fs.write(fd, line, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    await new Promise<void>((resolve, reject) => {
      fs.close(fd, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  });
}

/**
 * Reads the single endpoint line the worker writes. Resolves on the first
 * newline (or on end of stream with pending text) and always releases the
 * stream.
 */
export async function receiveHandoff(stream: Readable, timeoutMs: number): Promise<string> {
  return await new Promise<string>((resolve, reject) => {
    let buffer = "";
    let settled = false;

    const finish = (settle: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      stream.off("data", onData);
      stream.off("end", onEnd);
      stream.off("error", onError);
      stream.destroy();
      settle();
    };

    const settleWithLine = (line: string, emptyReason: string) => {
      finish(() => {
        if (line.length === 0) {
          reject(new HandoffError(emptyReason));
          return;
        }
        resolve(line);
      });
    };

    const onData = (chunk: Buffer | string) => {
      buffer += chunk.toString();
      const index = buffer.indexOf("\n");
      if (index >= 0) {
        settleWithLine(buffer.slice(0, index).trim(), "Worker reported an empty endpoint");
      }
    };

    const onEnd = () => {
      settleWithLine(buffer.trim(), "Worker exited before reporting its endpoint");
    };

    const onError = (error: Error) => {
      finish(() => {
        reject(new HandoffError(`Handoff channel failed: ${error.message}`, { cause: error }));
      });
    };

    const timer = setTimeout(() => {
      finish(() => reject(new HandoffTimeoutError(timeoutMs)));
    }, timeoutMs);

    stream.on("data", onData);
    stream.once("end", onEnd);
    stream.once("error", onError);
  });
}
