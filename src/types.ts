export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  USAGE: 2,
  TIMEOUT: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const ENDPOINT_MODES = ["direct", "proxied"] as const;
export type EndpointMode = (typeof ENDPOINT_MODES)[number];

export const CONVERSATION_STATES = [
  "awaiting-turn",
  "rendering-response",
  "completed",
  "abandoned",
] as const;
export type ConversationStateName = (typeof CONVERSATION_STATES)[number];

export const WORKER_STAGES = ["intermediate", "worker"] as const;
export type WorkerStage = (typeof WORKER_STAGES)[number];

export const ERROR_DETAIL_CODES = [
  "USAGE_INVALID_ARGUMENT",
  "PORT_RANGE_EXHAUSTED",
  "DETACH_FAILED",
  "HANDOFF_CLOSED",
  "HANDOFF_TIMEOUT",
  "CONVERSATION_ABANDONED",
  "CONVERSATION_CLOSED",
] as const;
export type ErrorDetailCode = (typeof ERROR_DETAIL_CODES)[number];

export type SessionEndpoint = {
  readonly host: string;
  readonly port: number;
  readonly basePath: string;
  readonly mode: EndpointMode;
};

export type PortRange = {
  minPort: number;
  maxPort: number;
};

export type TurnRequest = {
  method: string;
  query: Record<string, string>;
  rawQuery: string;
  contentType?: string;
  body?: Buffer;
};

export type ProxyRequest = {
  targetPort: number;
  remainderQuery: string;
};

export type RenderedResponse = {
  status: number;
  contentType: string;
  body: Buffer;
};

/**
 * One queued unit of audio output. `tts` is spoken when no `wav` is given or
 * the file cannot be fetched; `data` names client-side recorded audio.
 */
export type AudioInput = {
  tts?: string;
  wav?: string;
  data?: string;
};

type InlineGrammar = {
  grammar: string;
  grammarSrc?: never;
};

type ExternalGrammar = {
  grammarSrc: string;
  grammar?: never;
};

export type ListenOptions = (InlineGrammar | ExternalGrammar) & {
  noinput?: string;
  nomatch?: string;
  timeoutSeconds?: number;
  bargein?: boolean;
};

export type AudioSequence = string | AudioInput | ReadonlyArray<string | AudioInput>;

export type RecordOptions = {
  grammar: string;
  nullAudioWord?: string;
  replayWord?: string;
  helpWord?: string;
  doneRecordingAudio?: AudioSequence;
  replayPreAudio?: AudioSequence;
  replayPostAudio?: AudioSequence;
  helpAudio?: AudioSequence;
  nomatch?: AudioSequence;
  noinput?: AudioSequence;
  maxTimeSeconds?: number;
  finalSilenceSeconds?: number;
};

export type RecordingResult =
  | { kind: "aborted" }
  | { kind: "discarded"; disposition: string }
  | { kind: "accepted"; disposition: string; audio: Buffer };

/**
 * The conversation surface an application script drives, whether it runs
 * against a voice client over HTTP or in a terminal.
 */
export interface VoiceSession {
  audio(input: string | AudioInput): void;
  pause(milliseconds: number): void;
  listen(options: ListenOptions): Promise<string>;
  record(options: RecordOptions): Promise<RecordingResult>;
  goToUrl(url: string): Promise<void>;
  disconnect(): Promise<void>;
}

export type VoiceApp = (session: VoiceSession) => Promise<void>;
