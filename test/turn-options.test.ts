import assert from "node:assert/strict";
import test from "node:test";
import { ConversationUsageError } from "../src/errors.js";
import {
  audioSequenceItems,
  normalizeAudioInput,
  resolveRecordOptions,
  validateListenOptions,
  validatePauseMilliseconds,
} from "../src/turn-options.js";

test("normalizeAudioInput treats a string as speech text", () => {
  assert.deepEqual(normalizeAudioInput("Hello"), { tts: "Hello" });
});

test("normalizeAudioInput requires at least one source", () => {
  assert.throws(() => normalizeAudioInput({}), {
    name: "ConversationUsageError",
    message: "Audio requires at least one of tts, wav or data",
  });
  assert.throws(() => normalizeAudioInput({ tts: "" }), ConversationUsageError);
});

test("normalizeAudioInput rejects wav combined with data", () => {
  assert.throws(() => normalizeAudioInput({ wav: "a.wav", data: "rec" }), {
    message: "Audio cannot combine wav and data",
  });
});

test("audioSequenceItems accepts a single item, a list, or nothing", () => {
  assert.deepEqual(audioSequenceItems(undefined), []);
  assert.deepEqual(audioSequenceItems("One"), [{ tts: "One" }]);
  assert.deepEqual(audioSequenceItems(["One", { wav: "two.wav" }]), [
    { tts: "One" },
    { wav: "two.wav" },
  ]);
});

test("validatePauseMilliseconds rounds positive durations", () => {
  assert.equal(validatePauseMilliseconds(249.6), 250);
});

test("validatePauseMilliseconds rejects non-positive and non-finite durations", () => {
  for (const value of [0, -5, Number.NaN, Number.POSITIVE_INFINITY]) {
    assert.throws(() => validatePauseMilliseconds(value), {
      message: "Pause requires a positive number of milliseconds",
    });
  }
});

test("validateListenOptions accepts exactly one grammar source", () => {
  assert.deepEqual(validateListenOptions({ grammar: "yes | no" }), { grammar: "yes | no" });
  assert.deepEqual(validateListenOptions({ grammarSrc: "digits.grxml" }), {
    grammarSrc: "digits.grxml",
  });
});

test("validateListenOptions rejects an empty grammar", () => {
  assert.throws(() => validateListenOptions({ grammar: "" }), {
    message: "Listen requires exactly one of grammar and grammarSrc",
  });
});

test("validateListenOptions rejects a non-positive timeout", () => {
  assert.throws(() => validateListenOptions({ grammar: "yes", timeoutSeconds: 0 }), {
    message: "Listen timeout must be a positive number of seconds",
  });
});

test("resolveRecordOptions fills defaults", () => {
  assert.deepEqual(resolveRecordOptions({ grammar: "keep | discard" }), {
    grammar: "keep | discard",
    nullAudioWord: "",
    replayWord: "",
    helpWord: "",
    doneRecordingAudio: [{ tts: "Got it." }],
    replayPreAudio: [],
    replayPostAudio: [],
    helpAudio: [],
    nomatch: [{ tts: "I'm sorry, I didn't get that." }],
    noinput: [{ tts: "I'm sorry, I didn't hear anything." }],
    maxTimeSeconds: 30,
    finalSilenceSeconds: 2,
  });
});

test("resolveRecordOptions keeps explicit handlers and limits", () => {
  const resolved = resolveRecordOptions({
    grammar: "keep",
    noinput: ["Anyone there?", "Still waiting."],
    maxTimeSeconds: 10,
  });
  assert.deepEqual(resolved.noinput, [{ tts: "Anyone there?" }, { tts: "Still waiting." }]);
  assert.equal(resolved.maxTimeSeconds, 10);
});

test("resolveRecordOptions requires a grammar", () => {
  assert.throws(() => resolveRecordOptions({ grammar: "" }), {
    message: "Record requires a grammar",
  });
});
