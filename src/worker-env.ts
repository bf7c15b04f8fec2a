import { WORKER_STAGES, type WorkerStage } from "./types.js";

export const WORKER_PAYLOAD_ENV = "VOXBRIDGE_WORKER_PAYLOAD";

export type WorkerPayload = {
  stage: WorkerStage;
  invokerPid: number;
};

type UnknownRecord = Record<string, unknown>;

function asRecord(value: unknown): UnknownRecord | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return value as UnknownRecord;
}

function isWorkerStage(value: unknown): value is WorkerStage {
  return typeof value === "string" && WORKER_STAGES.some((stage) => stage === value);
}

export function parseWorkerPayload(raw: string): WorkerPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error("worker payload is not valid JSON", { cause: error });
  }
  const record = asRecord(parsed);
  if (!record) {
    throw new Error("worker payload must be an object");
  }

  if (!isWorkerStage(record.stage)) {
    throw new Error("worker payload has invalid stage");
  }
  if (
    typeof record.invokerPid !== "number" ||
    !Number.isInteger(record.invokerPid) ||
    record.invokerPid <= 0
  ) {
    throw new Error("worker payload missing invokerPid");
  }

  return {
    stage: record.stage,
    invokerPid: record.invokerPid,
  };
}

export function serializeWorkerPayload(payload: WorkerPayload): string {
  return JSON.stringify(payload);
}

/**
 * Returns the payload and removes it from `env`, so processes the worker
 * spawns later never mistake themselves for a session worker.
 */
export function takeWorkerPayload(env: NodeJS.ProcessEnv): WorkerPayload | undefined {
  const raw = env[WORKER_PAYLOAD_ENV];
  if (raw == null || raw.length === 0) {
    return undefined;
  }
  delete env[WORKER_PAYLOAD_ENV];
  return parseWorkerPayload(raw);
}
