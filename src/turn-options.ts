import { ConversationUsageError } from "./errors.js";
import type { AudioInput, AudioSequence, ListenOptions, RecordOptions } from "./types.js";

const DEFAULT_DONE_RECORDING_AUDIO: AudioInput = { tts: "Got it." };
const DEFAULT_RECORD_NOMATCH: AudioInput = { tts: "I'm sorry, I didn't get that." };
const DEFAULT_RECORD_NOINPUT: AudioInput = { tts: "I'm sorry, I didn't hear anything." };
const DEFAULT_MAX_RECORD_SECONDS = 30;
const DEFAULT_FINAL_SILENCE_SECONDS = 2;

function isNonEmpty(value: string | undefined): value is string {
  return typeof value === "string" && value.length > 0;
}

export function normalizeAudioInput(input: string | AudioInput): AudioInput {
  if (typeof input === "string") {
    return { tts: input };
  }
  if (!isNonEmpty(input.tts) && !isNonEmpty(input.wav) && !isNonEmpty(input.data)) {
    throw new ConversationUsageError("Audio requires at least one of tts, wav or data");
  }
  if (isNonEmpty(input.wav) && isNonEmpty(input.data)) {
    throw new ConversationUsageError("Audio cannot combine wav and data");
  }
  return input;
}

function isAudioList(
  sequence: AudioSequence,
): sequence is ReadonlyArray<string | AudioInput> {
  return Array.isArray(sequence);
}

export function audioSequenceItems(sequence: AudioSequence | undefined): AudioInput[] {
  if (sequence == null) {
    return [];
  }
  if (isAudioList(sequence)) {
    return sequence.map((item) => normalizeAudioInput(item));
  }
  return [normalizeAudioInput(sequence)];
}

export function validatePauseMilliseconds(milliseconds: number): number {
  if (!Number.isFinite(milliseconds) || milliseconds <= 0) {
    throw new ConversationUsageError("Pause requires a positive number of milliseconds");
  }
  return Math.round(milliseconds);
}

function validatePositiveSeconds(label: string, value: number | undefined): void {
  if (value != null && (!Number.isFinite(value) || value <= 0)) {
    throw new ConversationUsageError(`${label} must be a positive number of seconds`);
  }
}

export function validateListenOptions(options: ListenOptions): ListenOptions {
  const hasGrammar = isNonEmpty(options.grammar);
  const hasGrammarSrc = isNonEmpty(options.grammarSrc);
  if (hasGrammar === hasGrammarSrc) {
    throw new ConversationUsageError(
      "Listen requires exactly one of grammar and grammarSrc",
    );
  }
  validatePositiveSeconds("Listen timeout", options.timeoutSeconds);
  return options;
}

export type ResolvedRecordOptions = {
  grammar: string;
  nullAudioWord: string;
  replayWord: string;
  helpWord: string;
  doneRecordingAudio: AudioInput[];
  replayPreAudio: AudioInput[];
  replayPostAudio: AudioInput[];
  helpAudio: AudioInput[];
  nomatch: AudioInput[];
  noinput: AudioInput[];
  maxTimeSeconds: number;
  finalSilenceSeconds: number;
};

export function resolveRecordOptions(options: RecordOptions): ResolvedRecordOptions {
  if (!isNonEmpty(options.grammar)) {
    throw new ConversationUsageError("Record requires a grammar");
  }
  validatePositiveSeconds("Record maxTime", options.maxTimeSeconds);
  validatePositiveSeconds("Record finalSilence", options.finalSilenceSeconds);

  const nomatch = audioSequenceItems(options.nomatch);
  const noinput = audioSequenceItems(options.noinput);
  const doneRecordingAudio = audioSequenceItems(options.doneRecordingAudio);

  return {
    grammar: options.grammar,
    nullAudioWord: options.nullAudioWord ?? "",
    replayWord: options.replayWord ?? "",
    helpWord: options.helpWord ?? "",
    doneRecordingAudio:
      doneRecordingAudio.length > 0 ? doneRecordingAudio : [DEFAULT_DONE_RECORDING_AUDIO],
    replayPreAudio: audioSequenceItems(options.replayPreAudio),
    replayPostAudio: audioSequenceItems(options.replayPostAudio),
    helpAudio: audioSequenceItems(options.helpAudio),
    nomatch: nomatch.length > 0 ? nomatch : [DEFAULT_RECORD_NOMATCH],
    noinput: noinput.length > 0 ? noinput : [DEFAULT_RECORD_NOINPUT],
    maxTimeSeconds: options.maxTimeSeconds ?? DEFAULT_MAX_RECORD_SECONDS,
    finalSilenceSeconds: options.finalSilenceSeconds ?? DEFAULT_FINAL_SILENCE_SECONDS,
  };
}
