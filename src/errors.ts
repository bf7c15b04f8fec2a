import type { ErrorDetailCode } from "./types.js";

export class VoxbridgeError extends Error {
  readonly detailCode: ErrorDetailCode;

  constructor(message: string, detailCode: ErrorDetailCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "VoxbridgeError";
    this.detailCode = detailCode;
  }
}

/** A caller passed an illegal combination of arguments; nothing was sent. */
export class ConversationUsageError extends VoxbridgeError {
  constructor(message: string) {
    super(message, "USAGE_INVALID_ARGUMENT");
    this.name = "ConversationUsageError";
  }
}

export class PortExhaustedError extends VoxbridgeError {
  constructor(minPort: number) {
    super(`No bindable port between ${minPort} and 65535`, "PORT_RANGE_EXHAUSTED");
    this.name = "PortExhaustedError";
  }
}

export class DetachError extends VoxbridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "DETACH_FAILED", options);
    this.name = "DetachError";
  }
}

export class HandoffError extends VoxbridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "HANDOFF_CLOSED", options);
    this.name = "HandoffError";
  }
}

export class HandoffTimeoutError extends VoxbridgeError {
  constructor(timeoutMs: number) {
    super(`Worker did not report its endpoint within ${timeoutMs}ms`, "HANDOFF_TIMEOUT");
    this.name = "HandoffTimeoutError";
  }
}

export class ConversationAbandonedError extends VoxbridgeError {
  constructor(reason: string) {
    super(reason, "CONVERSATION_ABANDONED");
    this.name = "ConversationAbandonedError";
  }
}

export class ConversationClosedError extends VoxbridgeError {
  constructor() {
    super("Conversation has already ended", "CONVERSATION_CLOSED");
    this.name = "ConversationClosedError";
  }
}

export function formatErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
