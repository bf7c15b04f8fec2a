import net from "node:net";
import { ConversationUsageError, PortExhaustedError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import type { PortRange } from "./types.js";

const HIGHEST_PORT = 65_535;
const CONTENTION_CODES = new Set(["EADDRINUSE", "EACCES"]);

export type PortAllocation<S extends net.Server = net.Server> = {
  port: number;
  usedFallback: boolean;
  server: S;
};

export type AllocatePortOptions = {
  host?: string;
  logger?: Logger;
};

export async function listenServer(
  server: net.Server,
  port: number,
  host?: string,
): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };

    server.once("listening", onListening);
    server.once("error", onError);
    if (host) {
      server.listen(port, host);
    } else {
      server.listen(port);
    }
  });
}

export async function closeServer(server: net.Server): Promise<void> {
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
}

function isContention(error: unknown): boolean {
  const code = (error as NodeJS.ErrnoException | undefined)?.code;
  return typeof code === "string" && CONTENTION_CODES.has(code);
}

function validateRange(range: PortRange): void {
  const valid = (port: number) => Number.isInteger(port) && port >= 1 && port <= HIGHEST_PORT;
  if (!valid(range.minPort) || !valid(range.maxPort)) {
    throw new ConversationUsageError(
      `Port range ${range.minPort}-${range.maxPort} must use integers between 1 and ${HIGHEST_PORT}`,
    );
  }
  if (range.minPort > range.maxPort) {
    throw new ConversationUsageError(
      `Port range start ${range.minPort} is greater than its end ${range.maxPort}`,
    );
  }
}

/**
 * Binds a fresh server on the lowest free port from `minPort` upward. Ports
 * past `maxPort` are still tried but reported with `usedFallback`, which
 * callers treat as a signal to route the caller through the tunnel.
 */
export async function allocatePort<S extends net.Server>(
  range: PortRange,
  createServer: () => S,
  options: AllocatePortOptions = {},
): Promise<PortAllocation<S>> {
  validateRange(range);
  const logger = options.logger ?? silentLogger;

  for (let port = range.minPort; port <= HIGHEST_PORT; port += 1) {
    if (port === range.maxPort + 1) {
      logger.log(
        `Couldn't find an unused port between ${range.minPort} and ${range.maxPort}`,
      );
    }

    const server = createServer();
    try {
      await listenServer(server, port, options.host);
    } catch (error) {
      if (isContention(error)) {
        continue;
      }
      throw error;
    }

    return {
      port,
      usedFallback: port > range.maxPort,
      server,
    };
  }

  throw new PortExhaustedError(range.minPort);
}

/** Probe form of {@link allocatePort}: the port is released before returning. */
export async function allocate(
  minPort: number,
  maxPort: number,
  host?: string,
): Promise<{ port: number; usedFallback: boolean }> {
  const allocation = await allocatePort({ minPort, maxPort }, () => net.createServer(), {
    host,
  });
  await closeServer(allocation.server);
  return {
    port: allocation.port,
    usedFallback: allocation.usedFallback,
  };
}
