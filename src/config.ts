import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

type ConfigFileShape = {
  minPort?: unknown;
  maxPort?: unknown;
  avoidFirewall?: unknown;
  timeout?: unknown;
  handoffTimeout?: unknown;
  debug?: unknown;
  debugDir?: unknown;
  serverName?: unknown;
  publicHost?: unknown;
  bindHost?: unknown;
};

/** Explicit settings passed by the application script; these win over files. */
export type VoxbridgeConfigOverrides = {
  minPort?: number;
  maxPort?: number;
  avoidFirewall?: boolean;
  /** Idle seconds to wait for the caller's next turn. */
  timeout?: number;
  /** Seconds the invoker waits for the worker's endpoint. */
  handoffTimeout?: number;
  debug?: boolean;
  debugDir?: string;
  serverName?: string;
  publicHost?: string;
  bindHost?: string;
};

export type ResolvedVoxbridgeConfig = {
  minPort: number;
  maxPort: number;
  avoidFirewall: boolean;
  idleTimeoutMs: number;
  handoffTimeoutMs: number;
  debug: boolean;
  debugDir: string;
  serverName?: string;
  publicHost: string;
  bindHost?: string;
  globalPath: string;
  projectPath: string;
  hasGlobalConfig: boolean;
  hasProjectConfig: boolean;
};

type ConfigFileLoadResult = {
  config?: ConfigFileShape;
  exists: boolean;
};

export const DEFAULT_MIN_PORT = 7500;
export const DEFAULT_MAX_PORT = 7550;
export const DEFAULT_IDLE_TIMEOUT_MS = 60_000;
export const DEFAULT_HANDOFF_TIMEOUT_MS = 30_000;
const OVERRIDES_SOURCE = "application options";

function defaultGlobalConfigPath(): string {
  const xdgConfigHome = process.env.XDG_CONFIG_HOME?.trim();
  const base =
    xdgConfigHome && xdgConfigHome.length > 0
      ? xdgConfigHome
      : path.join(os.homedir(), ".config");
  return path.join(base, "voxbridge", "config.json");
}

function projectConfigPath(cwd: string): string {
  return path.join(path.resolve(cwd), ".voxbridgerc.json");
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function parsePort(
  field: "minPort" | "maxPort",
  value: unknown,
  sourcePath: string,
): number | undefined {
  if (value == null) {
    return undefined;
  }
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < 1 ||
    value > 65_535
  ) {
    throw new Error(
      `Invalid config ${field} in ${sourcePath}: expected integer port between 1 and 65535`,
    );
  }
  return value;
}

function parseSeconds(
  field: "timeout" | "handoffTimeout",
  value: unknown,
  sourcePath: string,
): number | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid config ${field} in ${sourcePath}: expected positive seconds`);
  }
  return Math.round(value * 1_000);
}

function parseBoolean(
  field: "avoidFirewall" | "debug",
  value: unknown,
  sourcePath: string,
): boolean | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new Error(`Invalid config ${field} in ${sourcePath}: expected boolean`);
  }
  return value;
}

function parseNonEmptyString(
  field: "debugDir" | "serverName" | "publicHost" | "bindHost",
  value: unknown,
  sourcePath: string,
): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`Invalid config ${field} in ${sourcePath}: expected non-empty string`);
  }
  return value.trim();
}

async function readConfigFile(filePath: string): Promise<ConfigFileLoadResult> {
  try {
    const payload = await fs.readFile(filePath, "utf8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid JSON in ${filePath}: ${reason}`, {
        cause: error,
      });
    }

    if (!isObject(parsed)) {
      throw new Error(`Invalid config in ${filePath}: expected top-level JSON object`);
    }
    return {
      config: parsed,
      exists: true,
    };
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return { exists: false };
    }
    throw error;
  }
}

type ConfigLayer = {
  config?: ConfigFileShape;
  sourcePath: string;
};

function pick<T>(
  layers: ConfigLayer[],
  read: (config: ConfigFileShape, sourcePath: string) => T | undefined,
): T | undefined {
  let result: T | undefined;
  for (const layer of layers) {
    if (!layer.config) {
      continue;
    }
    const value = read(layer.config, layer.sourcePath);
    if (value !== undefined) {
      result = value;
    }
  }
  return result;
}

export async function loadResolvedConfig(
  cwd: string,
  overrides: VoxbridgeConfigOverrides = {},
): Promise<ResolvedVoxbridgeConfig> {
  const globalPath = defaultGlobalConfigPath();
  const projectPath = projectConfigPath(cwd);

  const [globalResult, projectResult] = await Promise.all([
    readConfigFile(globalPath),
    readConfigFile(projectPath),
  ]);

  // lowest priority first
  const layers: ConfigLayer[] = [
    { config: globalResult.config, sourcePath: globalPath },
    { config: projectResult.config, sourcePath: projectPath },
    { config: overrides, sourcePath: OVERRIDES_SOURCE },
  ];

  const minPort =
    pick(layers, (config, source) => parsePort("minPort", config.minPort, source)) ??
    DEFAULT_MIN_PORT;
  const maxPort =
    pick(layers, (config, source) => parsePort("maxPort", config.maxPort, source)) ??
    Math.max(DEFAULT_MAX_PORT, minPort);
  if (minPort > maxPort) {
    throw new Error(`Invalid config: minPort ${minPort} is greater than maxPort ${maxPort}`);
  }

  return {
    minPort,
    maxPort,
    avoidFirewall:
      pick(layers, (config, source) =>
        parseBoolean("avoidFirewall", config.avoidFirewall, source),
      ) ?? false,
    idleTimeoutMs:
      pick(layers, (config, source) => parseSeconds("timeout", config.timeout, source)) ??
      DEFAULT_IDLE_TIMEOUT_MS,
    handoffTimeoutMs:
      pick(layers, (config, source) =>
        parseSeconds("handoffTimeout", config.handoffTimeout, source),
      ) ?? DEFAULT_HANDOFF_TIMEOUT_MS,
    debug:
      pick(layers, (config, source) => parseBoolean("debug", config.debug, source)) ??
      false,
    debugDir:
      pick(layers, (config, source) =>
        parseNonEmptyString("debugDir", config.debugDir, source),
      ) ?? os.tmpdir(),
    serverName: pick(layers, (config, source) =>
      parseNonEmptyString("serverName", config.serverName, source),
    ),
    publicHost:
      pick(layers, (config, source) =>
        parseNonEmptyString("publicHost", config.publicHost, source),
      ) ?? os.hostname(),
    bindHost: pick(layers, (config, source) =>
      parseNonEmptyString("bindHost", config.bindHost, source),
    ),
    globalPath,
    projectPath,
    hasGlobalConfig: globalResult.exists,
    hasProjectConfig: projectResult.exists,
  };
}

export function toConfigDisplay(config: ResolvedVoxbridgeConfig): {
  minPort: number;
  maxPort: number;
  avoidFirewall: boolean;
  timeout: number;
  handoffTimeout: number;
  debug: boolean;
  debugDir: string;
  serverName: string | null;
  publicHost: string;
  bindHost: string | null;
} {
  return {
    minPort: config.minPort,
    maxPort: config.maxPort,
    avoidFirewall: config.avoidFirewall,
    timeout: config.idleTimeoutMs / 1_000,
    handoffTimeout: config.handoffTimeoutMs / 1_000,
    debug: config.debug,
    debugDir: config.debugDir,
    serverName: config.serverName ?? null,
    publicHost: config.publicHost,
    bindHost: config.bindHost ?? null,
  };
}

export async function initGlobalConfigFile(): Promise<{
  path: string;
  created: boolean;
}> {
  const configPath = defaultGlobalConfigPath();
  await fs.mkdir(path.dirname(configPath), { recursive: true });

  try {
    await fs.access(configPath);
    return {
      path: configPath,
      created: false,
    };
  } catch {
    // file does not exist yet
  }

  const payload = {
    minPort: DEFAULT_MIN_PORT,
    maxPort: DEFAULT_MAX_PORT,
    avoidFirewall: false,
    timeout: DEFAULT_IDLE_TIMEOUT_MS / 1_000,
    handoffTimeout: DEFAULT_HANDOFF_TIMEOUT_MS / 1_000,
    debug: false,
  };

  await fs.writeFile(configPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
  return {
    path: configPath,
    created: true,
  };
}
