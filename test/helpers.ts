import fs from "node:fs/promises";
import http from "node:http";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { fileURLToPath } from "node:url";
import type {
  DetachedChild,
  ProcessPlatform,
  SpawnRequest,
} from "../src/process-supervisor.js";

export class ExitSignal extends Error {
  readonly code: number;

  constructor(code: number) {
    super(`process exited with ${code}`);
    this.name = "ExitSignal";
    this.code = code;
  }
}

export function isExitWith(code: number): (error: unknown) => boolean {
  return (error) => error instanceof ExitSignal && error.code === code;
}

export type StubPlatformOptions = {
  env?: NodeJS.ProcessEnv;
  argv?: string[];
  execArgv?: string[];
  pid?: number;
  spawn?: (request: SpawnRequest) => Promise<DetachedChild>;
  openLogFile?: (filePath: string) => number;
};

export type StubPlatform = {
  platform: ProcessPlatform;
  spawns: SpawnRequest[];
  exits: number[];
  openedLogs: string[];
};

export function createStubPlatform(options: StubPlatformOptions = {}): StubPlatform {
  const spawns: SpawnRequest[] = [];
  const exits: number[] = [];
  const openedLogs: string[] = [];

  const platform: ProcessPlatform = {
    env: options.env ?? {},
    argv: options.argv ?? [process.execPath, fileURLToPath(import.meta.url)],
    execPath: "/usr/bin/node",
    execArgv: options.execArgv ?? [],
    pid: options.pid ?? 100,
    async spawnDetached(request: SpawnRequest): Promise<DetachedChild> {
      spawns.push(request);
      if (options.spawn) {
        return await options.spawn(request);
      }
      return { pid: 4242, handoff: null, unref: () => {} };
    },
    openLogFile(filePath: string): number {
      openedLogs.push(filePath);
      return options.openLogFile ? options.openLogFile(filePath) : 99;
    },
    exit(code: number): never {
      exits.push(code);
      throw new ExitSignal(code);
    },
  };

  return { platform, spawns, exits, openedLogs };
}

export type Capture = {
  stream: Writable;
  text(): string;
};

export function createCapture(): Capture {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      callback();
    },
  });
  return {
    stream,
    text: () => Buffer.concat(chunks).toString("utf8"),
  };
}

export async function findFreePort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => resolve());
  });
  const address = server.address();
  const port = address && typeof address === "object" ? address.port : 0;
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  return port;
}

export type HttpResult = {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
};

export type HttpRequestOptions = {
  method?: string;
  body?: string | Buffer;
  headers?: http.OutgoingHttpHeaders;
};

export async function httpRequest(
  url: string,
  options: HttpRequestOptions = {},
): Promise<HttpResult> {
  return await new Promise<HttpResult>((resolve, reject) => {
    const req = http.request(
      url,
      { method: options.method ?? "GET", headers: options.headers, agent: false },
      (res) => {
        let body = "";
        res.setEncoding("utf8");
        res.on("data", (chunk: string) => {
          body += chunk;
        });
        res.once("end", () => {
          resolve({ status: res.statusCode ?? 0, headers: res.headers, body });
        });
        res.once("error", reject);
      },
    );
    req.once("error", reject);
    if (options.body != null) {
      req.end(options.body);
    } else {
      req.end();
    }
  });
}

export async function waitFor(
  condition: () => boolean,
  timeoutMs = 2_000,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Points HOME at a fresh directory and clears XDG_CONFIG_HOME for `run`. */
export async function withTempEnv(
  run: (ctx: { homeDir: string }) => Promise<void>,
): Promise<void> {
  const originalHome = process.env.HOME;
  const originalXdg = process.env.XDG_CONFIG_HOME;

  const homeDir = await fs.mkdtemp(path.join(os.tmpdir(), "voxbridge-test-home-"));
  process.env.HOME = homeDir;
  delete process.env.XDG_CONFIG_HOME;

  try {
    await run({ homeDir });
  } finally {
    if (originalHome == null) {
      delete process.env.HOME;
    } else {
      process.env.HOME = originalHome;
    }
    if (originalXdg != null) {
      process.env.XDG_CONFIG_HOME = originalXdg;
    }

    await fs.rm(homeDir, { recursive: true, force: true });
  }
}

/** A stub HTTP server on 127.0.0.1 that records every request it answers. */
export type RecordedRequest = {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
};

export type StubServer = {
  port: number;
  requests: RecordedRequest[];
  close(): Promise<void>;
};

export async function startStubServer(
  reply: (request: RecordedRequest, res: http.ServerResponse) => void,
): Promise<StubServer> {
  const requests: RecordedRequest[] = [];
  const server = http.createServer((req, res) => {
    let body = "";
    req.setEncoding("utf8");
    req.on("data", (chunk: string) => {
      body += chunk;
    });
    req.once("end", () => {
      const recorded: RecordedRequest = {
        method: req.method ?? "",
        url: req.url ?? "",
        headers: req.headers,
        body,
      };
      requests.push(recorded);
      reply(recorded, res);
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => resolve());
  });
  const address = server.address();
  const port = address && typeof address === "object" ? address.port : 0;

  return {
    port,
    requests,
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
    },
  };
}
