import type { AudioInput } from "./types.js";

export const RESULT_FIELD = "voxbridge_result";
export const RECORDING_FIELD = "voxbridge_recording";
/** Present in the query of a recording submission so the tunnel forwards a POST. */
export const RECORDING_MARKER = "voxbridge.recordvalue";
export const HOME_TARGET = "_home";
export const MARKUP_CONTENT_TYPE = "text/vxml";

const DOCUMENT_HEAD = ['<?xml version="1.0"?>', '<vxml version="2.1">'];
const DEFAULT_NOINPUT = ["<audio>Sorry, I did not hear anything.</audio>", "<reprompt/>"];
const DEFAULT_NOMATCH = ["<audio>What was that again?</audio>", "<reprompt/>"];

export function escapeMarkup(text: string): string {
  return text
    .replaceAll("&", "&amp;")
    .replaceAll('"', "&quot;")
    .replaceAll(">", "&gt;")
    .replaceAll("<", "&lt;");
}

function cdata(text: string): string {
  return `<![CDATA[${text.replaceAll("]]>", "]]]]><![CDATA[>")}]]>`;
}

function document(bodyLines: string[]): string {
  return `${[...DOCUMENT_HEAD, ...bodyLines, "</vxml>"].join("\n")}\n`;
}

/**
 * Resolves a script-relative URL against the front-end URL: `/x` is relative
 * to the host root, `x` to the script's directory. Surrounding quotes are
 * stripped; absolute http(s) URLs and `_home` pass through.
 */
export function resolveAgainstOrigin(url: string, originUrl?: string): string {
  if (url === HOME_TARGET) {
    return url;
  }
  const unquoted = url.replace(/^['"](.*)['"]$/, "$1");
  if (/^https?:/i.test(unquoted) || !originUrl) {
    return unquoted;
  }
  return new URL(unquoted, originUrl).href;
}

export function renderAudioFragment(input: AudioInput, originUrl?: string): string {
  const text = escapeMarkup(input.tts ?? "");
  if (input.wav) {
    const src = escapeMarkup(resolveAgainstOrigin(input.wav, originUrl));
    return `<audio src="${src}">${text}</audio>`;
  }
  if (input.data) {
    return `<audio data="${escapeMarkup(input.data)}">${text}</audio>`;
  }
  return `<audio>${text}</audio>`;
}

export function renderPauseFragment(milliseconds: number): string {
  return `<break time="${milliseconds}ms"/>`;
}

function promptLines(fragments: readonly string[]): string[] {
  if (fragments.length === 0) {
    return [];
  }
  return [`<prompt>${fragments.join("\n")}</prompt>`];
}

function resultUrl(endpointUrl: string, value: string): string {
  return escapeMarkup(`${endpointUrl}result=${encodeURIComponent(value)}`);
}

function scriptString(value: string): string {
  return `'${value.replaceAll("\\", "\\\\").replaceAll("'", "\\'")}'`;
}

/** ECMAScript expression for the endpoint URL carrying the recognized result. */
function resultExpr(endpointUrl: string, suffix = ""): string {
  const tail = suffix.length > 0 ? ` + ${scriptString(suffix)}` : "";
  return escapeMarkup(
    `${scriptString(`${endpointUrl}result=`)} + encodeURIComponent(${RESULT_FIELD})${tail}`,
  );
}

export function renderRedirectDocument(endpointUrl: string): string {
  return document([
    "<form><block>",
    `  <goto next="${escapeMarkup(`${endpointUrl}x=y`)}"/>`,
    "</block></form>",
  ]);
}

export type ListenDocumentParams = {
  endpointUrl: string;
  fragments: readonly string[];
  grammar?: string;
  grammarSrc?: string;
  noinput?: string;
  nomatch?: string;
  timeoutSeconds?: number;
  bargein?: boolean;
};

export function renderListenDocument(params: ListenDocumentParams): string {
  const timeoutPart =
    params.timeoutSeconds != null ? ` timeout="${params.timeoutSeconds}s"` : "";
  const bargeinPart = params.bargein === false ? ' bargein="false"' : "";
  const grammar = params.grammarSrc
    ? `<grammar src="${escapeMarkup(params.grammarSrc)}"/>`
    : `<grammar>${cdata(params.grammar ?? "")}</grammar>`;
  const noinput =
    params.noinput != null
      ? [`<goto next="${resultUrl(params.endpointUrl, params.noinput)}"/>`]
      : DEFAULT_NOINPUT;
  const nomatch =
    params.nomatch != null
      ? [`<goto next="${resultUrl(params.endpointUrl, params.nomatch)}"/>`]
      : DEFAULT_NOMATCH;

  return document([
    '<form id="top">',
    `<field name="${RESULT_FIELD}"${timeoutPart}${bargeinPart}>`,
    ...promptLines(params.fragments),
    grammar,
    "<noinput>",
    ...noinput,
    "</noinput>",
    "<nomatch>",
    ...nomatch,
    "</nomatch>",
    "<filled>",
    `  <goto expr="${resultExpr(params.endpointUrl)}"/>`,
    "</filled>",
    "</field>",
    "</form>",
  ]);
}

export type RecordDocumentParams = {
  endpointUrl: string;
  fragments: readonly string[];
  grammar: string;
  nullAudioWord: string;
  replayWord: string;
  helpWord: string;
  doneRecordingAudio: readonly string[];
  replayPreAudio: readonly string[];
  replayPostAudio: readonly string[];
  helpAudio: readonly string[];
  nomatch: ReadonlyArray<readonly string[]>;
  noinput: ReadonlyArray<readonly string[]>;
  maxTimeSeconds: number;
  finalSilenceSeconds: number;
};

function handlerLines(tag: string, items: ReadonlyArray<readonly string[]>): string[] {
  return items.map((fragments) => `<${tag}>${fragments.join("\n")}<reprompt/></${tag}>`);
}

/**
 * Two-form recording dialog: capture audio, then ask for a disposition word.
 * The replay and help words are handled by the client; the null-audio word
 * and any other accepted word come back to the endpoint, the latter as a POST
 * carrying the recording.
 */
export function renderRecordDocument(params: RecordDocumentParams): string {
  const url = escapeMarkup(params.endpointUrl);

  return document([
    '<form id="record">',
    `<record name="${RECORDING_FIELD}" dtmfterm="true" finalsilence="${params.finalSilenceSeconds}s" maxtime="${params.maxTimeSeconds}s">`,
    ...promptLines(params.fragments),
    "<filled>",
    ...params.doneRecordingAudio,
    "</filled>",
    '<noinput><goto next="#abort"/></noinput>',
    '<nomatch><goto next="#abort"/></nomatch>',
    "</record>",
    `<field name="${RESULT_FIELD}">`,
    `<grammar>${cdata(params.grammar)}</grammar>`,
    ...handlerLines("nomatch", params.nomatch),
    ...handlerLines("noinput", params.noinput),
    "<filled>",
    `<if cond="${RESULT_FIELD} == '${escapeMarkup(params.replayWord)}'">`,
    ...params.replayPreAudio,
    `<audio expr="${RECORDING_FIELD}"/>`,
    ...params.replayPostAudio,
    "<reprompt/>",
    `<elseif cond="${RESULT_FIELD} == '${escapeMarkup(params.nullAudioWord)}'"/>`,
    `<goto next="${resultUrl(params.endpointUrl, params.nullAudioWord)}&amp;"/>`,
    `<elseif cond="${RESULT_FIELD} == '${escapeMarkup(params.helpWord)}'"/>`,
    ...params.helpAudio,
    "<reprompt/>",
    "<else/>",
    `<submit expr="${resultExpr(params.endpointUrl, `&${RECORDING_MARKER}=1`)}" method="post" enctype="multipart/form-data" namelist="${RECORDING_FIELD}"/>`,
    "</if>",
    "</filled>",
    "</field>",
    "</form>",
    '<form id="abort">',
    "<block>",
    `<goto next="${url}result=0&amp;"/>`,
    "</block>",
    "</form>",
  ]);
}

export function renderGoToDocument(fragments: readonly string[], targetUrl: string): string {
  return document([
    "<form>",
    "<block>",
    ...fragments,
    `<goto next="${escapeMarkup(targetUrl)}"/>`,
    "</block>",
    "</form>",
  ]);
}

export function renderDisconnectDocument(fragments: readonly string[]): string {
  return document(["<form>", "<block>", ...fragments, "<disconnect/>", "</block>", "</form>"]);
}

export function renderSpokenErrorDocument(message: string): string {
  return document([
    "<form>",
    "<block>",
    `<audio>${escapeMarkup(message)}</audio>`,
    "</block>",
    "</form>",
  ]);
}
