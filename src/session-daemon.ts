import http from "node:http";
import { ConversationUsageError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { MARKUP_CONTENT_TYPE } from "./markup.js";
import { allocatePort, closeServer } from "./port-allocator.js";
import type { TurnRequest } from "./types.js";

/** One accepted connection, answered exactly once. */
export type PendingTurn = {
  readonly request: TurnRequest;
  readonly answered: boolean;
  respond(document: string): Promise<void>;
  reject(status: number): Promise<void>;
};

export type SessionDaemonOptions = {
  minPort: number;
  maxPort: number;
  host?: string;
  logger?: Logger;
};

function parseTurnRequest(req: http.IncomingMessage, body: Buffer): TurnRequest {
  const url = new URL(req.url ?? "/", "http://localhost");
  const query: Record<string, string> = {};
  for (const [key, value] of url.searchParams) {
    query[key] = value;
  }
  return {
    method: (req.method ?? "GET").toUpperCase(),
    query,
    rawQuery: url.search.startsWith("?") ? url.search.slice(1) : url.search,
    contentType: req.headers["content-type"],
    body: body.length > 0 ? body : undefined,
  };
}

async function finishResponse(
  res: http.ServerResponse,
  status: number,
  headers: http.OutgoingHttpHeaders,
  body: string,
): Promise<void> {
  if (res.destroyed || res.writableEnded || res.req.socket.destroyed) {
    return;
  }
  await new Promise<void>((resolve) => {
    const settle = () => {
      res.off("finish", settle);
      res.off("close", settle);
      resolve();
    };
    // the client may hang up before the document is flushed
    res.once("finish", settle);
    res.once("close", settle);
    res.writeHead(status, {
      ...headers,
      Connection: "close",
      "Content-Length": Buffer.byteLength(body),
    });
    res.end(body);
  });
}

function createPendingTurn(
  request: TurnRequest,
  res: http.ServerResponse,
): PendingTurn {
  let answered = false;
  const claim = () => {
    if (answered) {
      throw new ConversationUsageError("Turn was already answered");
    }
    answered = true;
  };

  return {
    request,
    get answered() {
      return answered;
    },
    async respond(document: string): Promise<void> {
      claim();
      await finishResponse(
        res,
        200,
        {
          "Cache-Control": "no-cache",
          "Content-Type": MARKUP_CONTENT_TYPE,
        },
        document,
      );
    },
    async reject(status: number): Promise<void> {
      claim();
      await finishResponse(
        res,
        status,
        { "Content-Type": "text/plain; charset=utf-8" },
        `${status} ${http.STATUS_CODES[status] ?? "Error"}\n`,
      );
    },
  };
}

/**
 * Single-conversation HTTP listener. Connections are queued in arrival order
 * and handed out one at a time through {@link SessionDaemon.nextTurn}.
 */
export class SessionDaemon {
  readonly port: number;
  readonly usedFallback: boolean;
  private readonly server: http.Server;
  private readonly logger: Logger;
  private readonly pending: PendingTurn[] = [];
  private readonly waiters: Array<(turn: PendingTurn | undefined) => void> = [];
  private closed = false;

  private constructor(
    server: http.Server,
    port: number,
    usedFallback: boolean,
    logger: Logger,
  ) {
    this.server = server;
    this.port = port;
    this.usedFallback = usedFallback;
    this.logger = logger;
  }

  static async start(options: SessionDaemonOptions): Promise<SessionDaemon> {
    const logger = options.logger ?? silentLogger;
    const daemonRef: { current: SessionDaemon | undefined } = { current: undefined };

    const allocation = await allocatePort(
      { minPort: options.minPort, maxPort: options.maxPort },
      () =>
        http.createServer((req, res) => {
          daemonRef.current?.handleRequest(req, res);
        }),
      { host: options.host, logger },
    );

    const daemon = new SessionDaemon(
      allocation.server,
      allocation.port,
      allocation.usedFallback,
      logger,
    );
    daemonRef.current = daemon;
    logger.log(`Server ready on port ${allocation.port}`);
    return daemon;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  queueDepth(): number {
    return this.pending.length;
  }

  /**
   * Next queued connection, or the next one to arrive. Resolves `undefined`
   * when `timeoutMs` elapses first or the daemon closes.
   */
  async nextTurn(timeoutMs?: number): Promise<PendingTurn | undefined> {
    const queued = this.pending.shift();
    if (queued) {
      return queued;
    }
    if (this.closed) {
      return undefined;
    }

    return await new Promise<PendingTurn | undefined>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const waiter = (turn: PendingTurn | undefined) => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(turn);
      };

      if (timeoutMs != null) {
        timer = setTimeout(
          () => {
            const index = this.waiters.indexOf(waiter);
            if (index >= 0) {
              this.waiters.splice(index, 1);
            }
            resolve(undefined);
          },
          Math.max(0, timeoutMs),
        );
      }

      this.waiters.push(waiter);
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }

    await Promise.all(this.pending.splice(0).map((turn) => turn.reject(503)));

    const closing = closeServer(this.server);
    this.server.closeAllConnections();
    await closing;
    this.logger.log(`Server on port ${this.port} closed`);
  }

  private enqueue(turn: PendingTurn): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(turn);
      return;
    }

    this.pending.push(turn);
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    if (this.closed) {
      void finishResponse(res, 503, { "Content-Type": "text/plain" }, "503 Service Unavailable\n");
      return;
    }

    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    req.once("end", () => {
      const request = parseTurnRequest(req, Buffer.concat(chunks));
      this.logger.log(`Accepted ${request.method} connection <${request.rawQuery}>`);
      this.enqueue(createPendingTurn(request, res));
    });
    req.once("error", (error) => {
      this.logger.log(`Connection went away without a complete request: ${error.message}`);
    });
  }
}
