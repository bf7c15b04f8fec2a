import http from "node:http";
import { formatErrorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { MARKUP_CONTENT_TYPE, RECORDING_MARKER, renderSpokenErrorDocument } from "./markup.js";
import { PROXY_PARAM } from "./session-endpoint.js";
import type { ProxyRequest, RenderedResponse } from "./types.js";

/** The tunnel only ever forwards to the worker on this machine. */
export const RELAY_HOST = "127.0.0.1";

const PROXY_QUERY_PATTERN = new RegExp(`(?:^|&)${PROXY_PARAM}=(\\d+)&(.*)$`);

export function parseProxyQuery(query: string | undefined): ProxyRequest | undefined {
  if (!query) {
    return undefined;
  }
  const match = PROXY_QUERY_PATTERN.exec(query);
  if (!match) {
    return undefined;
  }
  const targetPort = Number(match[1]);
  if (!Number.isInteger(targetPort) || targetPort < 1 || targetPort > 65_535) {
    return undefined;
  }
  return {
    targetPort,
    remainderQuery: match[2],
  };
}

export function isRecordingSubmission(remainderQuery: string): boolean {
  return remainderQuery.includes(RECORDING_MARKER);
}

export type RelayOptions = ProxyRequest & {
  body?: Buffer;
  contentType?: string;
  method?: "GET" | "POST";
  host?: string;
  timeoutMs?: number;
  logger?: Logger;
};

type LocalResponse = {
  status: number;
  statusMessage: string;
  contentType?: string;
  body: Buffer;
};

async function sendLocalRequest(
  options: RelayOptions,
  method: "GET" | "POST",
): Promise<LocalResponse> {
  const headers: http.OutgoingHttpHeaders = {};
  if (method === "POST") {
    headers["Content-Length"] = options.body?.length ?? 0;
    if (options.contentType) {
      headers["Content-Type"] = options.contentType;
    }
  }

  return await new Promise<LocalResponse>((resolve, reject) => {
    const req = http.request(
      {
        host: options.host ?? RELAY_HOST,
        port: options.targetPort,
        path: `/?${options.remainderQuery}`,
        method,
        headers,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => {
          chunks.push(chunk);
        });
        res.once("end", () => {
          const status = res.statusCode ?? 500;
          resolve({
            status,
            statusMessage: res.statusMessage || http.STATUS_CODES[status] || "Error",
            contentType: res.headers["content-type"],
            body: Buffer.concat(chunks),
          });
        });
        res.once("error", reject);
      },
    );

    req.once("error", reject);
    if (options.timeoutMs != null) {
      req.setTimeout(options.timeoutMs, () => {
        req.destroy(new Error(`Relay timed out after ${options.timeoutMs}ms`));
      });
    }
    if (method === "POST" && options.body) {
      req.end(options.body);
    } else {
      req.end();
    }
  });
}

function spokenError(message: string): RenderedResponse {
  return {
    status: 200,
    contentType: MARKUP_CONTENT_TYPE,
    body: Buffer.from(renderSpokenErrorDocument(message), "utf8"),
  };
}

/**
 * Forwards one turn to the worker listening on `targetPort` and returns what
 * the voice client should see: the worker's document unchanged, or a spoken
 * error when the worker cannot be reached or refuses the request.
 */
export async function relay(options: RelayOptions): Promise<RenderedResponse> {
  const logger = options.logger ?? silentLogger;
  const method =
    options.method ??
    (options.body || isRecordingSubmission(options.remainderQuery) ? "POST" : "GET");

  let response: LocalResponse;
  try {
    response = await sendLocalRequest(options, method);
  } catch (error) {
    const message = formatErrorMessage(error);
    logger.log(`Relay to port ${options.targetPort} failed: ${message}`);
    return spokenError(message);
  }

  if (response.status >= 400) {
    logger.log(`Relay to port ${options.targetPort} answered ${response.status}`);
    return spokenError(response.statusMessage);
  }

  return {
    status: response.status,
    contentType: response.contentType ?? MARKUP_CONTENT_TYPE,
    body: response.body,
  };
}
