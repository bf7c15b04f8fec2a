import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import test from "node:test";
import {
  formatCgiResponse,
  isCgiInvocation,
  originUrlFor,
  readCgiBody,
  readCgiRequest,
  writeCgiResponse,
} from "../src/cgi.js";
import { createCapture } from "./helpers.js";

test("readCgiRequest reads the gateway variables", () => {
  const request = readCgiRequest({
    SERVER_NAME: "voice.test",
    SCRIPT_NAME: "/apps/app.cgi",
    QUERY_STRING: "result=yes",
    REQUEST_METHOD: "post",
    CONTENT_TYPE: "multipart/form-data; boundary=abc",
    CONTENT_LENGTH: "12",
  });
  assert.deepEqual(request, {
    serverName: "voice.test",
    scriptName: "/apps/app.cgi",
    queryString: "result=yes",
    requestMethod: "POST",
    contentType: "multipart/form-data; boundary=abc",
    contentLength: 12,
  });
  assert.equal(isCgiInvocation(request), true);
});

test("readCgiRequest falls back for missing or malformed values", () => {
  const request = readCgiRequest({ SERVER_NAME: "", CONTENT_LENGTH: "abc" });
  assert.deepEqual(request, {
    serverName: undefined,
    scriptName: undefined,
    queryString: "",
    requestMethod: "GET",
    contentType: undefined,
    contentLength: 0,
  });
  assert.equal(isCgiInvocation(request), false);
});

test("originUrlFor joins server name and script path", () => {
  const request = readCgiRequest({ SERVER_NAME: "voice.test", SCRIPT_NAME: "/apps/app.cgi" });
  assert.equal(originUrlFor(request), "http://voice.test/apps/app.cgi");
  assert.equal(originUrlFor(request, "front.test"), "http://front.test/apps/app.cgi");
});

test("originUrlFor returns undefined outside a gateway request", () => {
  assert.equal(originUrlFor(readCgiRequest({})), undefined);
});

test("readCgiBody reads exactly CONTENT_LENGTH bytes", async () => {
  const stdin = new PassThrough();
  stdin.end("hello world");
  const body = await readCgiBody(stdin, 5);
  assert.equal(body.toString("utf8"), "hello");
});

test("readCgiBody reads nothing for a zero length", async () => {
  const body = await readCgiBody(new PassThrough(), 0);
  assert.equal(body.length, 0);
});

test("formatCgiResponse omits the status line for 200", () => {
  const output = formatCgiResponse({
    status: 200,
    contentType: "text/vxml",
    body: Buffer.from("<vxml/>"),
  });
  assert.equal(
    output.toString("utf8"),
    "Cache-Control: no-cache\r\nContent-Type: text/vxml\r\n\r\n<vxml/>",
  );
});

test("formatCgiResponse adds a status line for other codes", () => {
  const output = formatCgiResponse({
    status: 403,
    contentType: "text/plain",
    body: Buffer.from("no"),
  });
  assert.equal(
    output.toString("utf8"),
    "Status: 403 Forbidden\r\nCache-Control: no-cache\r\nContent-Type: text/plain\r\n\r\nno",
  );
});

test("formatCgiResponse writes the formatted response to stdout", async () => {
  const capture = createCapture();
  await writeCgiResponse(capture.stream, {
    status: 200,
    contentType: "text/vxml",
    body: Buffer.from("<vxml/>"),
  });
  assert.equal(capture.text(), "Cache-Control: no-cache\r\nContent-Type: text/vxml\r\n\r\n<vxml/>");
});
