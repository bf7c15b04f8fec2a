export { runVoiceApp } from "./voice-app.js";
export type { RunOutcome, VoiceAppDeps, VoiceAppIo, VoiceAppOptions } from "./voice-app.js";
export { ConversationSession, RESULT_PARAM } from "./conversation-session.js";
export type { ConversationSessionOptions, EndTarget } from "./conversation-session.js";
export { ConsoleSession } from "./console-session.js";
export type { ConsoleSessionOptions } from "./console-session.js";
export { SessionDaemon } from "./session-daemon.js";
export type { PendingTurn, SessionDaemonOptions } from "./session-daemon.js";
export { allocate, allocatePort } from "./port-allocator.js";
export { createSessionEndpoint, formatEndpointUrl } from "./session-endpoint.js";
export { parseProxyQuery, relay } from "./proxy-tunnel.js";
export { ProcessSupervisor, createNodeProcessPlatform } from "./process-supervisor.js";
export type { ProcessPlatform, Role } from "./process-supervisor.js";
export {
  createFdHandoffWriter,
  createStreamHandoffWriter,
  receiveHandoff,
} from "./handoff-channel.js";
export type { HandoffWriter } from "./handoff-channel.js";
export { loadResolvedConfig } from "./config.js";
export type { ResolvedVoxbridgeConfig, VoxbridgeConfigOverrides } from "./config.js";
export { createLogger } from "./log.js";
export type { Logger } from "./log.js";
export * from "./errors.js";
export * from "./types.js";
