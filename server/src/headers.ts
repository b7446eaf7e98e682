import type { Header, HeaderList, HttpScope, Scope, WebSocketScope } from "./types";

export type ParsedRequest = {
  scope: Scope;
  upgradeProtocol: string | null;
};

/**
 * Builds the immutable scope for a stream from its initial header block.
 * Pseudo-headers are consumed here; `:authority` is surfaced to the
 * application as `host`, everything else without a leading colon passes
 * through in order.
 */
export function parseRequestHeaders(headers: readonly Header[], httpVersion: string): ParsedRequest {
  const passthrough: Header[] = [];
  let method = "";
  let rawPath = "";
  let upgradeProtocol: string | null = null;
  let subprotocols: string[] = [];

  for (const [name, value] of headers) {
    if (name === ":authority") {
      passthrough.push(["host", value]);
    } else if (name === ":method") {
      method = value;
    } else if (name === ":path") {
      rawPath = value;
    } else if (name === ":protocol") {
      upgradeProtocol = value;
    } else if (name && !name.startsWith(":")) {
      passthrough.push([name, value]);
      if (name === "sec-websocket-protocol") {
        subprotocols = parseSubprotocols(value);
      }
    }
  }

  const { path, queryString } = splitRawPath(rawPath);
  const common = {
    httpVersion,
    method,
    path,
    queryString,
    rawPath,
    rootPath: "",
    headers: Object.freeze(passthrough)
  };

  if (method === "CONNECT" && upgradeProtocol === "websocket") {
    const scope: WebSocketScope = Object.freeze({
      ...common,
      type: "websocket",
      scheme: "wss",
      subprotocols: Object.freeze(subprotocols)
    });
    return { scope, upgradeProtocol };
  }
  const scope: HttpScope = Object.freeze({ ...common, type: "http", scheme: "https" });
  return { scope, upgradeProtocol };
}

export function splitRawPath(rawPath: string): { path: string; queryString: string } {
  const index = rawPath.indexOf("?");
  if (index === -1) {
    return { path: rawPath, queryString: "" };
  }
  return { path: rawPath.slice(0, index), queryString: rawPath.slice(index + 1) };
}

function parseSubprotocols(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** RFC 1123 date in GMT, e.g. `Sun, 18 Oct 2026 09:30:00 GMT`. */
export function formatHttpDate(date: Date = new Date()): string {
  return date.toUTCString();
}

export function responseHeaders(
  status: number,
  serverName: string,
  extra: readonly Header[] = [],
  now: Date = new Date()
): HeaderList {
  return [[":status", String(status)], ["server", serverName], ["date", formatHttpDate(now)], ...extra];
}
