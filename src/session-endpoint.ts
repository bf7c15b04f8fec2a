import type { EndpointMode, SessionEndpoint } from "./types.js";

export const PROXY_PARAM = "proxyfor";

export type SessionEndpointParams = {
  mode: EndpointMode;
  port: number;
  /** Host the caller can reach the worker on directly. */
  publicHost: string;
  /** Front-end host and script path, used to route through the tunnel. */
  serverName?: string;
  scriptName?: string;
};

export function createSessionEndpoint(params: SessionEndpointParams): SessionEndpoint {
  if (params.mode === "proxied") {
    if (!params.serverName || !params.scriptName) {
      throw new Error("Proxied endpoint requires the front-end server name and script path");
    }
    return Object.freeze({
      host: params.serverName,
      port: params.port,
      basePath: params.scriptName,
      mode: params.mode,
    });
  }

  return Object.freeze({
    host: params.publicHost,
    port: params.port,
    basePath: "/",
    mode: params.mode,
  });
}

/**
 * The URL the caller is sent to, ending in a query separator so that
 * `result=<value>` can be appended directly.
 */
export function formatEndpointUrl(endpoint: SessionEndpoint): string {
  if (endpoint.mode === "proxied") {
    return `http://${endpoint.host}${endpoint.basePath}?${PROXY_PARAM}=${endpoint.port}&`;
  }
  return `http://${endpoint.host}:${endpoint.port}${endpoint.basePath}?`;
}
