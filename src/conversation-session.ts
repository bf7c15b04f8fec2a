import {
  ConversationAbandonedError,
  ConversationClosedError,
  ConversationUsageError,
} from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import {
  renderAudioFragment,
  renderDisconnectDocument,
  renderGoToDocument,
  renderListenDocument,
  renderPauseFragment,
  renderRecordDocument,
  resolveAgainstOrigin,
} from "./markup.js";
import { parseRecordingPayload, resolveBoundary } from "./recording.js";
import type { PendingTurn, SessionDaemon } from "./session-daemon.js";
import { formatEndpointUrl } from "./session-endpoint.js";
import {
  normalizeAudioInput,
  resolveRecordOptions,
  validateListenOptions,
  validatePauseMilliseconds,
} from "./turn-options.js";
import type {
  AudioInput,
  ConversationStateName,
  ListenOptions,
  RecordOptions,
  RecordingResult,
  SessionEndpoint,
  TurnRequest,
  VoiceSession,
} from "./types.js";

export const RESULT_PARAM = "result";

export type ConversationSessionOptions = {
  daemon: SessionDaemon;
  endpoint: SessionEndpoint;
  idleTimeoutMs: number;
  /** Front-end URL that relative audio, grammar and go-to URLs resolve against. */
  originUrl?: string;
  logger?: Logger;
};

export type EndTarget = { url: string } | "hangup";

function carriesResult(request: TurnRequest): boolean {
  return Object.hasOwn(request.query, RESULT_PARAM);
}

/**
 * Conversation state for one worker: output queued for the next response and
 * the connection that response goes to. Each prompt answers the held
 * connection and then waits for the caller's next request.
 */
export class ConversationSession implements VoiceSession {
  readonly endpoint: SessionEndpoint;
  readonly endpointUrl: string;
  private readonly daemon: SessionDaemon;
  private readonly idleTimeoutMs: number;
  private readonly originUrl?: string;
  private readonly logger: Logger;
  private pendingOutput: string[] = [];
  private current: PendingTurn | undefined;
  private stateName: ConversationStateName = "awaiting-turn";
  private turns = 0;

  constructor(options: ConversationSessionOptions) {
    this.daemon = options.daemon;
    this.endpoint = options.endpoint;
    this.endpointUrl = formatEndpointUrl(options.endpoint);
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.originUrl = options.originUrl;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): ConversationStateName {
    return this.stateName;
  }

  get completedTurns(): number {
    return this.turns;
  }

  get pendingOutputSegments(): readonly string[] {
    return [...this.pendingOutput];
  }

  /** Waits for the caller to follow the redirect and holds that connection. */
  async begin(): Promise<void> {
    this.assertActive();
    if (this.current) {
      throw new ConversationUsageError("Conversation has already begun");
    }
    await this.awaitTurn(() => true);
  }

  appendOutput(fragment: string): void {
    this.pendingOutput.push(fragment);
  }

  appendPause(milliseconds: number): void {
    const duration = validatePauseMilliseconds(milliseconds);
    this.appendOutput(renderPauseFragment(duration));
    this.logger.log(`Pausing for ${duration} milliseconds`);
  }

  audio(input: string | AudioInput): void {
    const fragment = renderAudioFragment(normalizeAudioInput(input), this.originUrl);
    this.appendOutput(fragment);
    this.logger.log(`Saying ${fragment}`);
  }

  pause(milliseconds: number): void {
    this.appendPause(milliseconds);
  }

  /** Returns the queued fragments and clears the queue. */
  flushOutput(): string[] {
    const fragments = this.pendingOutput;
    this.pendingOutput = [];
    return fragments;
  }

  async collectInput(options: ListenOptions): Promise<string> {
    const validated = validateListenOptions(options);
    const turn = this.requireHeldTurn();

    const document = renderListenDocument({
      endpointUrl: this.endpointUrl,
      fragments: this.flushOutput(),
      grammar: validated.grammar,
      grammarSrc: validated.grammarSrc
        ? resolveAgainstOrigin(validated.grammarSrc, this.originUrl)
        : undefined,
      noinput: validated.noinput,
      nomatch: validated.nomatch,
      timeoutSeconds: validated.timeoutSeconds,
      bargein: validated.bargein,
    });
    await this.completeTurn(turn, document);

    const reply = await this.awaitTurn(
      (request) => request.method === "GET" && carriesResult(request),
    );
    this.turns += 1;
    const value = reply.request.query[RESULT_PARAM];
    this.logger.log(`Got string ${value}`);
    return value;
  }

  async listen(options: ListenOptions): Promise<string> {
    return await this.collectInput(options);
  }

  async record(options: RecordOptions): Promise<RecordingResult> {
    const resolved = resolveRecordOptions(options);
    const turn = this.requireHeldTurn();
    const render = (items: AudioInput[]) =>
      items.map((item) => renderAudioFragment(item, this.originUrl));

    const document = renderRecordDocument({
      endpointUrl: this.endpointUrl,
      fragments: this.flushOutput(),
      grammar: resolved.grammar,
      nullAudioWord: resolved.nullAudioWord,
      replayWord: resolved.replayWord,
      helpWord: resolved.helpWord,
      doneRecordingAudio: render(resolved.doneRecordingAudio),
      replayPreAudio: render(resolved.replayPreAudio),
      replayPostAudio: render(resolved.replayPostAudio),
      helpAudio: render(resolved.helpAudio),
      nomatch: resolved.nomatch.map((item) => render([item])),
      noinput: resolved.noinput.map((item) => render([item])),
      maxTimeSeconds: resolved.maxTimeSeconds,
      finalSilenceSeconds: resolved.finalSilenceSeconds,
    });
    await this.completeTurn(turn, document);

    const reply = await this.awaitTurn(carriesResult);
    this.turns += 1;
    const disposition = reply.request.query[RESULT_PARAM];
    this.logger.log(`Got result code ${disposition}`);

    if (disposition === "" || disposition === "0") {
      return { kind: "aborted" };
    }
    if (resolved.nullAudioWord.length > 0 && disposition === resolved.nullAudioWord) {
      return { kind: "discarded", disposition };
    }

    const payload = parseRecordingPayload(
      reply.request.body ?? Buffer.alloc(0),
      resolveBoundary(reply.request.contentType),
    );
    for (const line of payload.headerLines) {
      this.logger.log(`Ignoring audio header line: ${line}`);
    }
    if (!payload.framed) {
      this.logger.log("No audio boundary found; keeping the whole body");
    }
    return { kind: "accepted", disposition, audio: payload.audio };
  }

  async goToUrl(url: string): Promise<void> {
    const target = resolveAgainstOrigin(url, this.originUrl);
    await this.end((fragments) => renderGoToDocument(fragments, target), `Going to ${target}`);
  }

  async disconnect(): Promise<void> {
    await this.end((fragments) => renderDisconnectDocument(fragments), "Disconnecting");
  }

  async endConversation(target: EndTarget): Promise<void> {
    if (target === "hangup") {
      await this.disconnect();
      return;
    }
    await this.goToUrl(target.url);
  }

  private assertActive(): void {
    if (this.stateName === "completed" || this.stateName === "abandoned") {
      throw new ConversationClosedError();
    }
  }

  private requireHeldTurn(): PendingTurn {
    this.assertActive();
    if (!this.current) {
      throw new ConversationUsageError(
        "No connection is waiting for a response; call begin() first",
      );
    }
    return this.current;
  }

  private async completeTurn(turn: PendingTurn, document: string): Promise<void> {
    this.current = undefined;
    this.stateName = "awaiting-turn";
    this.logger.log("Closing connection");
    await turn.respond(document);
  }

  private async end(render: (fragments: string[]) => string, label: string): Promise<void> {
    const turn = this.requireHeldTurn();
    const document = render(this.flushOutput());
    this.current = undefined;
    this.stateName = "completed";
    this.logger.log(label);
    await turn.respond(document);
    await this.daemon.close();
  }

  /**
   * Waits for a connection `accept` approves. Others get 403 and the wait
   * goes on; the idle timeout bounds the whole wait, not each connection.
   */
  private async awaitTurn(accept: (request: TurnRequest) => boolean): Promise<PendingTurn> {
    const deadline = Date.now() + this.idleTimeoutMs;
    this.logger.log("Waiting for new connection");

    for (;;) {
      const turn = await this.daemon.nextTurn(Math.max(0, deadline - Date.now()));
      if (!turn) {
        return await this.abandon(
          `No connection within ${this.idleTimeoutMs}ms; caller has hung up`,
        );
      }
      if (!accept(turn.request)) {
        this.logger.log(`Invalid request <${turn.request.rawQuery}>`);
        await turn.reject(403);
        continue;
      }
      this.current = turn;
      this.stateName = "rendering-response";
      return turn;
    }
  }

  private async abandon(reason: string): Promise<never> {
    this.stateName = "abandoned";
    this.current = undefined;
    this.logger.log(reason);
    await this.daemon.close();
    throw new ConversationAbandonedError(reason);
  }
}
