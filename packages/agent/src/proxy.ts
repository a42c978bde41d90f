import { AgentError, errorMessage } from "./errors";
import { FetchFn } from "./accessPolicy";

const HOP_HEADERS = new Set(["host", "content-length", "connection", "transfer-encoding", "keep-alive", "upgrade"]);
const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

export interface ProxyRequest {
  target: string;
  method: string;
  headers: Record<string, string | string[] | undefined>;
  body?: Buffer;
  /** Extra query parameters appended to the target URL. */
  query?: URLSearchParams;
  timeoutMs: number;
}

export interface ProxyResult {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Performs one pass-through HTTP request on behalf of a browser client.
 * Network failures, timeouts and invalid targets raise `UPSTREAM_ERROR`.
 */
export async function proxyRequest(options: ProxyRequest, fetchImpl: FetchFn = fetch): Promise<ProxyResult> {
  const url = buildTargetUrl(options.target, options.query);

  let response: Response;
  try {
    response = await fetchImpl(url.toString(), {
      method: options.method,
      headers: forwardableHeaders(options.headers),
      body: BODYLESS_METHODS.has(options.method) || !options.body?.length ? undefined : options.body,
      redirect: "follow",
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new AgentError("UPSTREAM_ERROR", `Proxy request to ${url.origin} failed: ${errorMessage(error)}`);
  }

  const body = Buffer.from(await response.arrayBuffer());
  return {
    status: response.status,
    headers: {
      "content-type": response.headers.get("content-type") ?? "application/octet-stream",
    },
    body,
  };
}

function buildTargetUrl(target: string, query: URLSearchParams | undefined): URL {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    throw new AgentError("INVALID_INPUT", "Query parameter 'url' must be an absolute URL.");
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new AgentError("INVALID_INPUT", "Only http and https URLs can be proxied.");
  }

  query?.forEach((value, key) => {
    url.searchParams.append(key, value);
  });
  return url;
}

export function forwardableHeaders(headers: ProxyRequest["headers"]): Record<string, string> {
  const forwarded: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || HOP_HEADERS.has(name.toLowerCase())) {
      continue;
    }
    forwarded[name] = Array.isArray(value) ? value.join(", ") : value;
  }
  return forwarded;
}
