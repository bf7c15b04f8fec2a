import type { Readable, Writable } from "node:stream";
import http from "node:http";
import type { RenderedResponse } from "./types.js";

export type CgiRequest = {
  serverName?: string;
  scriptName?: string;
  queryString: string;
  requestMethod: string;
  contentType?: string;
  contentLength: number;
};

function nonEmpty(value: string | undefined): string | undefined {
  return value != null && value.length > 0 ? value : undefined;
}

export function readCgiRequest(env: NodeJS.ProcessEnv): CgiRequest {
  const contentLength = Number(env.CONTENT_LENGTH ?? 0);
  return {
    serverName: nonEmpty(env.SERVER_NAME),
    scriptName: nonEmpty(env.SCRIPT_NAME),
    queryString: env.QUERY_STRING ?? "",
    requestMethod: (env.REQUEST_METHOD ?? "GET").toUpperCase(),
    contentType: nonEmpty(env.CONTENT_TYPE),
    contentLength: Number.isInteger(contentLength) && contentLength > 0 ? contentLength : 0,
  };
}

export function isCgiInvocation(request: CgiRequest): boolean {
  return request.serverName != null && request.scriptName != null;
}

/** Absolute URL of the invoking script, as the voice client addressed it. */
export function originUrlFor(
  request: CgiRequest,
  serverNameOverride?: string,
): string | undefined {
  const server = serverNameOverride ?? request.serverName;
  if (!server || !request.scriptName) {
    return undefined;
  }
  return `http://${server}${request.scriptName}`;
}

export async function readCgiBody(stdin: Readable, contentLength: number): Promise<Buffer> {
  if (contentLength <= 0) {
    return Buffer.alloc(0);
  }
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of stdin) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    chunks.push(buffer);
    total += buffer.length;
    if (total >= contentLength) {
      break;
    }
  }
  return Buffer.concat(chunks).subarray(0, contentLength);
}

export function formatCgiResponse(response: RenderedResponse): Buffer {
  const lines: string[] = [];
  if (response.status !== 200) {
    lines.push(`Status: ${response.status} ${http.STATUS_CODES[response.status] ?? ""}`.trimEnd());
  }
  lines.push("Cache-Control: no-cache", `Content-Type: ${response.contentType}`, "", "");
  return Buffer.concat([Buffer.from(lines.join("\r\n"), "utf8"), response.body]);
}

export async function writeCgiResponse(
  stdout: Writable,
  response: RenderedResponse,
): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    stdout.write(formatCgiResponse(response), (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
