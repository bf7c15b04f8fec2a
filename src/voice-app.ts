import type { Readable, Writable } from "node:stream";
import {
  isCgiInvocation,
  originUrlFor,
  readCgiBody,
  readCgiRequest,
  writeCgiResponse,
  type CgiRequest,
} from "./cgi.js";
import { loadResolvedConfig, type ResolvedVoxbridgeConfig, type VoxbridgeConfigOverrides } from "./config.js";
import { ConsoleSession } from "./console-session.js";
import { ConversationSession } from "./conversation-session.js";
import {
  ConversationAbandonedError,
  DetachError,
  formatErrorMessage,
  HandoffError,
  HandoffTimeoutError,
} from "./errors.js";
import { receiveHandoff, type HandoffWriter } from "./handoff-channel.js";
import { createLogger, debugFilePath, reportFatal, type Logger } from "./log.js";
import { MARKUP_CONTENT_TYPE, renderRedirectDocument } from "./markup.js";
import {
  createNodeProcessPlatform,
  hasWorkerPayload,
  ProcessSupervisor,
  type ProcessPlatform,
} from "./process-supervisor.js";
import { parseProxyQuery, relay } from "./proxy-tunnel.js";
import { SessionDaemon } from "./session-daemon.js";
import { createSessionEndpoint, formatEndpointUrl } from "./session-endpoint.js";
import { EXIT_CODES, type ProxyRequest, type VoiceApp } from "./types.js";

export type VoiceAppOptions = VoxbridgeConfigOverrides & {
  /** Directory searched for `.voxbridgerc.json`. */
  cwd?: string;
  /** Mirror log lines to stderr. */
  verbose?: boolean;
};

export type VoiceAppIo = {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
};

export type VoiceAppDeps = {
  platform?: ProcessPlatform;
  io?: Partial<VoiceAppIo>;
  createHandoffWriter?: () => HandoffWriter;
};

export type RunOutcome = "relayed" | "console" | "redirected" | "abandoned";

type RunContext = {
  config: ResolvedVoxbridgeConfig;
  cgi: CgiRequest;
  io: VoiceAppIo;
  logger: Logger;
  platform: ProcessPlatform;
};

function isLifecycleError(error: unknown): boolean {
  return (
    error instanceof DetachError ||
    error instanceof HandoffError ||
    error instanceof HandoffTimeoutError
  );
}

async function runProxy(context: RunContext, proxy: ProxyRequest): Promise<RunOutcome> {
  const { cgi, io, logger } = context;
  const body =
    cgi.requestMethod === "POST" ? await readCgiBody(io.stdin, cgi.contentLength) : undefined;
  logger.log(`Relaying to port ${proxy.targetPort} <${proxy.remainderQuery}>`);
  const response = await relay({
    ...proxy,
    body: body && body.length > 0 ? body : undefined,
    contentType: cgi.contentType,
    logger,
  });
  await writeCgiResponse(io.stdout, response);
  return "relayed";
}

async function runConsole(app: VoiceApp, context: RunContext): Promise<RunOutcome> {
  const session = new ConsoleSession({
    input: context.io.stdin,
    output: context.io.stdout,
  });
  try {
    await app(session);
  } catch (error) {
    if (error instanceof ConversationAbandonedError) {
      return "abandoned";
    }
    throw error;
  } finally {
    session.close();
  }
  return "console";
}

async function runInvoker(handoff: Readable, context: RunContext): Promise<RunOutcome> {
  const url = await receiveHandoff(handoff, context.config.handoffTimeoutMs);
  context.logger.log(`Worker reported ${url}; redirecting caller`);
  await writeCgiResponse(context.io.stdout, {
    status: 200,
    contentType: MARKUP_CONTENT_TYPE,
    body: Buffer.from(renderRedirectDocument(url), "utf8"),
  });
  return "redirected";
}

async function runWorker(
  app: VoiceApp,
  handoff: HandoffWriter,
  context: RunContext,
): Promise<never> {
  const { config, cgi, io, logger, platform } = context;

  let daemon: SessionDaemon;
  try {
    daemon = await SessionDaemon.start({
      minPort: config.minPort,
      maxPort: config.maxPort,
      host: config.bindHost,
      logger,
    });
  } catch (error) {
    reportFatal(logger, `Worker cannot listen: ${formatErrorMessage(error)}`, io.stderr);
    return platform.exit(EXIT_CODES.ERROR);
  }

  const proxied = config.avoidFirewall || daemon.usedFallback;
  const endpoint = createSessionEndpoint({
    mode: proxied ? "proxied" : "direct",
    port: daemon.port,
    publicHost: config.publicHost,
    serverName: config.serverName ?? cgi.serverName,
    scriptName: cgi.scriptName,
  });
  const session = new ConversationSession({
    daemon,
    endpoint,
    idleTimeoutMs: config.idleTimeoutMs,
    originUrl: originUrlFor(cgi, config.serverName),
    logger,
  });

  let exitCode: number = EXIT_CODES.SUCCESS;
  try {
    await handoff.send(session.endpointUrl);
    logger.log(`Server ready; url is ${formatEndpointUrl(endpoint)}`);
    await session.begin();
    await app(session);
    if (session.state === "rendering-response") {
      await session.disconnect();
    }
  } catch (error) {
    if (error instanceof ConversationAbandonedError) {
      logger.log(`Conversation abandoned: ${error.message}`);
    } else {
      reportFatal(logger, `Conversation failed: ${formatErrorMessage(error)}`, io.stderr);
      exitCode = EXIT_CODES.ERROR;
    }
  } finally {
    await daemon.close();
  }

  return platform.exit(exitCode);
}

/**
 * Entry point for a voice application script. Depending on how the script
 * was started it relays a tunnelled turn, plays the conversation in the
 * terminal, redirects the caller to a freshly detached worker, or (inside
 * that worker) runs `app` against the caller until the conversation ends.
 * The worker and intermediate roles exit the process instead of returning.
 */
export async function runVoiceApp(
  app: VoiceApp,
  options: VoiceAppOptions = {},
  deps: VoiceAppDeps = {},
): Promise<RunOutcome> {
  const platform = deps.platform ?? createNodeProcessPlatform();
  const io: VoiceAppIo = {
    stdin: deps.io?.stdin ?? process.stdin,
    stdout: deps.io?.stdout ?? process.stdout,
    stderr: deps.io?.stderr ?? process.stderr,
  };
  const config = await loadResolvedConfig(options.cwd ?? process.cwd(), options);
  const logger = createLogger({
    debug: config.debug,
    filePath: debugFilePath(config.debugDir, platform.argv[1], "log", platform.pid),
    verbose: options.verbose,
    stream: io.stderr,
  });
  const context: RunContext = {
    config,
    cgi: readCgiRequest(platform.env),
    io,
    logger,
    platform,
  };

  try {
    if (!hasWorkerPayload(platform.env)) {
      const proxy = parseProxyQuery(context.cgi.queryString);
      if (proxy) {
        return await runProxy(context, proxy);
      }
      if (!isCgiInvocation(context.cgi)) {
        return await runConsole(app, context);
      }
    }

    const supervisor = new ProcessSupervisor({
      platform,
      logger,
      debug: config.debug,
      debugDir: config.debugDir,
      createHandoffWriter: deps.createHandoffWriter,
    });
    const role = await supervisor.detach();
    if (role.role === "invoker") {
      return await runInvoker(role.handoff, context);
    }
    return await runWorker(app, role.handoff, context);
  } catch (error) {
    if (isLifecycleError(error)) {
      reportFatal(logger, formatErrorMessage(error), io.stderr);
      return platform.exit(
        error instanceof HandoffTimeoutError ? EXIT_CODES.TIMEOUT : EXIT_CODES.ERROR,
      );
    }
    throw error;
  }
}
