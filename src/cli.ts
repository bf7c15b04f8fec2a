#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { initGlobalConfigFile, loadResolvedConfig, toConfigDisplay } from "./config.js";
import { VoxbridgeError } from "./errors.js";
import { createLogger } from "./log.js";
import { allocate } from "./port-allocator.js";
import { relay } from "./proxy-tunnel.js";
import { EXIT_CODES } from "./types.js";

type GlobalFlags = {
  cwd: string;
  verbose?: boolean;
};

type PortsFlags = {
  min?: number;
  max?: number;
  host?: string;
};

type RelayFlags = {
  post?: boolean;
  contentType?: string;
  timeout?: number;
};

export function parsePortOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65_535) {
    throw new InvalidArgumentError("Port must be an integer between 1 and 65535");
  }
  return parsed;
}

function parseTimeoutSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of seconds");
  }
  return Math.round(parsed * 1000);
}

export function formatPortReport(
  allocation: { port: number; usedFallback: boolean },
  range: { minPort: number; maxPort: number },
): string {
  if (allocation.usedFallback) {
    return `${allocation.port} (outside ${range.minPort}-${range.maxPort}; sessions will be proxied)`;
  }
  return String(allocation.port);
}

async function readStdinBody(): Promise<Buffer | undefined> {
  if (process.stdin.isTTY) {
    return undefined;
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const body = Buffer.concat(chunks);
  return body.length > 0 ? body : undefined;
}

function resolveGlobalFlags(command: Command): GlobalFlags {
  const opts = command.optsWithGlobals();
  return {
    cwd: typeof opts.cwd === "string" ? opts.cwd : process.cwd(),
    verbose: opts.verbose === true,
  };
}

async function handleConfigShow(command: Command): Promise<void> {
  const globalFlags = resolveGlobalFlags(command);
  const config = await loadResolvedConfig(globalFlags.cwd);
  const payload = {
    ...toConfigDisplay(config),
    paths: {
      global: config.globalPath,
      project: config.projectPath,
    },
    loaded: {
      global: config.hasGlobalConfig,
      project: config.hasProjectConfig,
    },
  };
  process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
}

async function handleConfigInit(): Promise<void> {
  const result = await initGlobalConfigFile();
  if (result.created) {
    process.stdout.write(`Created ${result.path}\n`);
    return;
  }
  process.stdout.write(`Config already exists: ${result.path}\n`);
}

async function handlePorts(flags: PortsFlags, command: Command): Promise<void> {
  const globalFlags = resolveGlobalFlags(command);
  const config = await loadResolvedConfig(globalFlags.cwd, {
    minPort: flags.min,
    maxPort: flags.max,
  });
  const allocation = await allocate(
    config.minPort,
    config.maxPort,
    flags.host ?? config.bindHost,
  );
  process.stdout.write(`${formatPortReport(allocation, config)}\n`);
}

async function handleRelay(
  port: number,
  query: string | undefined,
  flags: RelayFlags,
  command: Command,
): Promise<void> {
  const globalFlags = resolveGlobalFlags(command);
  const body = flags.post ? await readStdinBody() : undefined;
  const response = await relay({
    targetPort: port,
    remainderQuery: query ?? "",
    body,
    contentType: flags.contentType,
    method: flags.post ? "POST" : undefined,
    timeoutMs: flags.timeout,
    logger: createLogger({ verbose: globalFlags.verbose }),
  });
  process.stdout.write(response.body);
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = new Command();

  program
    .name("voxbridge")
    .description("Inspect configuration and talk to running voice session workers")
    .option("--cwd <dir>", "Working directory used to find .voxbridgerc.json", process.cwd())
    .option("--verbose", "Log progress to stderr")
    .showHelpAfterError();

  const configCommand = program.command("config").description("Inspect voxbridge configuration");

  configCommand
    .command("show")
    .description("Print the resolved configuration as JSON")
    .action(async function (this: Command) {
      await handleConfigShow(this);
    });

  configCommand
    .command("init")
    .description("Create the global config file with defaults")
    .action(async () => {
      await handleConfigInit();
    });

  program
    .command("ports")
    .description("Report the port the next session worker would bind")
    .option("--min <port>", "Lowest port to try", parsePortOption)
    .option("--max <port>", "Highest port before falling back to the tunnel", parsePortOption)
    .option("--host <host>", "Interface to probe")
    .action(async function (this: Command, flags: PortsFlags) {
      await handlePorts(flags, this);
    });

  program
    .command("relay")
    .description("Send one turn to a session worker on this machine and print its reply")
    .argument("<port>", "Worker port", parsePortOption)
    .argument("[query]", "Query string forwarded to the worker")
    .option("--post", "Send the turn as a POST, with stdin as the body")
    .option("--content-type <type>", "Content type of the request body")
    .option("--timeout <seconds>", "Give up after this many seconds", parseTimeoutSeconds)
    .action(async function (
      this: Command,
      port: number,
      query: string | undefined,
      flags: RelayFlags,
    ) {
      await handleRelay(port, query, flags, this);
    });

  program.addHelpText(
    "after",
    `
Examples:
  voxbridge config show
  voxbridge config init
  voxbridge ports --min 7600 --max 7610
  voxbridge relay 7500 "result=yes&"`,
  );

  program.exitOverride((error) => {
    throw error;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (
        error.code === "commander.helpDisplayed" ||
        error.code === "commander.version" ||
        error.code === "commander.help"
      ) {
        process.exit(EXIT_CODES.SUCCESS);
      }
      process.exit(EXIT_CODES.USAGE);
    }

    if (error instanceof VoxbridgeError && error.detailCode === "USAGE_INVALID_ARGUMENT") {
      process.stderr.write(`${error.message}\n`);
      process.exit(EXIT_CODES.USAGE);
    }

    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${message}\n`);
    process.exit(EXIT_CODES.ERROR);
  }
}

function isCliEntrypoint(argv: string[]): boolean {
  const entry = argv[1];
  if (!entry) {
    return false;
  }

  try {
    // argv[1] may be the npm bin symlink
    const resolved = pathToFileURL(realpathSync(entry)).href;
    return import.meta.url === resolved;
  } catch {
    return false;
  }
}

if (isCliEntrypoint(process.argv)) {
  void main(process.argv);
}
