import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { ConversationAbandonedError, ConversationClosedError } from "./errors.js";
import {
  normalizeAudioInput,
  resolveRecordOptions,
  validateListenOptions,
  validatePauseMilliseconds,
} from "./turn-options.js";
import type {
  AudioInput,
  ListenOptions,
  RecordOptions,
  RecordingResult,
  VoiceSession,
} from "./types.js";

const PLACEHOLDER_RECORDING = "insertsoundhere";

export type ConsoleSessionOptions = {
  input: Readable;
  output: Writable;
};

/**
 * Terminal stand-in for a voice caller: output is printed line by line and
 * each prompt reads one line of input. Handy for exercising an application's
 * logic without a voice platform.
 */
export class ConsoleSession implements VoiceSession {
  private readonly input: Readable;
  private readonly output: Writable;
  private rl: readline.Interface | undefined;
  private lines: AsyncIterator<string> | undefined;
  private ended = false;

  constructor(options: ConsoleSessionOptions) {
    this.input = options.input;
    this.output = options.output;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  audio(input: string | AudioInput): void {
    const audio = normalizeAudioInput(input);
    this.print(audio.tts || audio.wav || audio.data || "");
  }

  pause(milliseconds: number): void {
    validatePauseMilliseconds(milliseconds);
  }

  async listen(options: ListenOptions): Promise<string> {
    validateListenOptions(options);
    return await this.readLine();
  }

  async record(options: RecordOptions): Promise<RecordingResult> {
    const resolved = resolveRecordOptions(options);
    const disposition = await this.readLine();
    if (disposition === "" || disposition === "0") {
      return { kind: "aborted" };
    }
    if (resolved.nullAudioWord.length > 0 && disposition === resolved.nullAudioWord) {
      return { kind: "discarded", disposition };
    }
    return {
      kind: "accepted",
      disposition,
      audio: Buffer.from(PLACEHOLDER_RECORDING, "utf8"),
    };
  }

  async goToUrl(url: string): Promise<void> {
    this.assertOpen();
    this.print(`Going to ${url}`);
    this.close();
  }

  async disconnect(): Promise<void> {
    this.assertOpen();
    this.print("Disconnecting");
    this.close();
  }

  close(): void {
    this.ended = true;
    this.rl?.close();
  }

  private print(line: string): void {
    this.output.write(`${line}\n`);
  }

  private assertOpen(): void {
    if (this.ended) {
      throw new ConversationClosedError();
    }
  }

  private async readLine(): Promise<string> {
    this.assertOpen();
    if (!this.lines) {
      this.rl = readline.createInterface({ input: this.input, crlfDelay: Infinity });
      this.lines = this.rl[Symbol.asyncIterator]();
    }

    const next = await this.lines.next();
    if (next.done) {
      this.close();
      throw new ConversationAbandonedError("End of console input");
    }
    return next.value;
  }
}
