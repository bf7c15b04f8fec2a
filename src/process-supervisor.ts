import { spawn, type StdioOptions } from "node:child_process";
import fs, { realpathSync } from "node:fs";
import { Readable } from "node:stream";
import { ConversationUsageError, DetachError, formatErrorMessage } from "./errors.js";
import { createFdHandoffWriter, HANDOFF_FD, type HandoffWriter } from "./handoff-channel.js";
import { debugFilePath, silentLogger, type Logger } from "./log.js";
import { EXIT_CODES } from "./types.js";
import {
  serializeWorkerPayload,
  takeWorkerPayload,
  WORKER_PAYLOAD_ENV,
  type WorkerPayload,
} from "./worker-env.js";

export type SpawnRequest = {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  stdio: StdioOptions;
};

export type DetachedChild = {
  pid?: number;
  /** Read side of the handoff pipe, when the request asked for one. */
  handoff: Readable | null;
  unref(): void;
};

/** The process operations the supervisor needs, replaceable in tests. */
export interface ProcessPlatform {
  readonly env: NodeJS.ProcessEnv;
  readonly argv: readonly string[];
  readonly execPath: string;
  readonly execArgv: readonly string[];
  readonly pid: number;
  spawnDetached(request: SpawnRequest): Promise<DetachedChild>;
  openLogFile(filePath: string): number;
  exit(code: number): never;
}

async function spawnDetached(request: SpawnRequest): Promise<DetachedChild> {
  const child = spawn(request.command, request.args, {
    detached: true,
    stdio: request.stdio,
    env: request.env,
  });

  await new Promise<void>((resolve, reject) => {
    const onSpawn = () => {
      child.off("error", onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off("spawn", onSpawn);
      reject(error);
    };
    child.once("spawn", onSpawn);
    child.once("error", onError);
  });

  const pipe = child.stdio[HANDOFF_FD];
  return {
    pid: child.pid,
    handoff: pipe instanceof Readable ? pipe : null,
    unref: () => child.unref(),
  };
}

export function createNodeProcessPlatform(): ProcessPlatform {
  return {
    env: process.env,
    argv: process.argv,
    execPath: process.execPath,
    execArgv: process.execArgv,
    pid: process.pid,
    spawnDetached,
    openLogFile: (filePath) => fs.openSync(filePath, "a"),
    exit: (code) => process.exit(code),
  };
}

/**
 * Arguments that re-run the current script: the runtime's own flags (so a
 * loader such as tsx stays active), the resolved entry path, then the
 * original arguments.
 */
export function resolveSelfSpawnArgs(
  argv: readonly string[],
  execArgv: readonly string[] = [],
): string[] {
  const entry = argv[1];
  if (!entry || entry.trim().length === 0) {
    throw new DetachError("voxbridge self-spawn failed: missing script entry path");
  }
  const resolvedEntry = realpathSync(entry);
  return [...execArgv, resolvedEntry, ...argv.slice(2)];
}

export function hasWorkerPayload(env: NodeJS.ProcessEnv): boolean {
  const raw = env[WORKER_PAYLOAD_ENV];
  return raw != null && raw.length > 0;
}

export type Role =
  | { role: "invoker"; handoff: Readable; pid?: number }
  | { role: "worker"; handoff: HandoffWriter; invokerPid: number };

export type ProcessSupervisorOptions = {
  platform: ProcessPlatform;
  logger?: Logger;
  debug?: boolean;
  debugDir?: string;
  /** Worker-side handoff; defaults to the inherited pipe descriptor. */
  createHandoffWriter?: () => HandoffWriter;
};

export class ProcessSupervisor {
  private readonly platform: ProcessPlatform;
  private readonly logger: Logger;
  private readonly options: ProcessSupervisorOptions;
  private detached = false;

  constructor(options: ProcessSupervisorOptions) {
    this.platform = options.platform;
    this.logger = options.logger ?? silentLogger;
    this.options = options;
  }

  /**
   * Splits the conversation off the invoking request. The invoker gets the
   * handoff pipe back; the intermediate process re-spawns the worker and
   * exits; the worker gets the write side of the handoff.
   */
  async detach(): Promise<Role> {
    if (this.detached) {
      throw new ConversationUsageError("detach() may only be called once per process");
    }
    this.detached = true;

    let payload: WorkerPayload | undefined;
    try {
      payload = takeWorkerPayload(this.platform.env);
    } catch (error) {
      throw new DetachError(`Invalid worker payload: ${formatErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (!payload) {
      return await this.spawnIntermediate();
    }
    if (payload.stage === "intermediate") {
      return await this.spawnWorkerAndExit(payload);
    }

    this.logger.log(`Worker ${this.platform.pid} detached from invoker ${payload.invokerPid}`);
    return {
      role: "worker",
      handoff: this.options.createHandoffWriter?.() ?? createFdHandoffWriter(HANDOFF_FD),
      invokerPid: payload.invokerPid,
    };
  }

  private spawnRequest(payload: WorkerPayload, stdio: StdioOptions): SpawnRequest {
    return {
      command: this.platform.execPath,
      args: resolveSelfSpawnArgs(this.platform.argv, this.platform.execArgv),
      env: {
        ...this.platform.env,
        [WORKER_PAYLOAD_ENV]: serializeWorkerPayload(payload),
      },
      stdio,
    };
  }

  private async spawnIntermediate(): Promise<Role> {
    const request = this.spawnRequest(
      { stage: "intermediate", invokerPid: this.platform.pid },
      ["ignore", "ignore", "inherit", "pipe"],
    );

    let child: DetachedChild;
    try {
      child = await this.platform.spawnDetached(request);
    } catch (error) {
      throw new DetachError(`Can't fork: ${formatErrorMessage(error)}`, { cause: error });
    }

    if (!child.handoff) {
      throw new DetachError("Can't create handoff pipe");
    }
    child.unref();
    this.logger.log(`Spawned intermediate process ${child.pid ?? "unknown"}`);
    return {
      role: "invoker",
      handoff: child.handoff,
      pid: child.pid,
    };
  }

  private async spawnWorkerAndExit(payload: WorkerPayload): Promise<never> {
    let stderr: "ignore" | number = "ignore";
    if (this.options.debug && this.options.debugDir) {
      const stderrPath = debugFilePath(
        this.options.debugDir,
        this.platform.argv[1],
        "stderr",
        this.platform.pid,
      );
      try {
        stderr = this.platform.openLogFile(stderrPath);
      } catch (error) {
        throw new DetachError(`Can't make stderr go to ${stderrPath}`, { cause: error });
      }
    }

    const request = this.spawnRequest(
      { stage: "worker", invokerPid: payload.invokerPid },
      ["ignore", "ignore", stderr, HANDOFF_FD],
    );

    try {
      const child = await this.platform.spawnDetached(request);
      child.unref();
      this.logger.log(`Spawned worker ${child.pid ?? "unknown"}; intermediate exiting`);
    } catch (error) {
      throw new DetachError(`Can't start a new session: ${formatErrorMessage(error)}`, {
        cause: error,
      });
    }

    return this.platform.exit(EXIT_CODES.SUCCESS);
  }
}
