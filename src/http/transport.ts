import { upstreamError } from '../handlers/errors.js';
import type { JsonValue } from '../types/shared.js';

export interface HttpRequest {
  url: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Outbound HTTP seam for agents. Non-2xx statuses resolve normally; only
 * failures to get any response reject, as an upstream HandlerError.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export function bodyText(res: HttpResponse): string {
  return res.body.toString('utf-8');
}

export function bodyJson(res: HttpResponse): JsonValue {
  const text = bodyText(res);
  try {
    return JSON.parse(text);
  } catch (e) {
    throw upstreamError(`Invalid JSON from upstream (HTTP ${res.status})`, e);
  }
}

function failureReason(e: unknown): string {
  if (e instanceof Error) {
    // undici puts the socket-level reason on `cause`
    const cause = e.cause;
    if (cause instanceof Error && cause.message) return cause.message;
    return e.message;
  }
  return String(e);
}

export function createFetchTransport(defaults: { timeoutMs: number; userAgent: string }): HttpTransport {
  return {
    async send(request) {
      const timeoutMs = request.timeoutMs ?? defaults.timeoutMs;
      let res: Response;
      try {
        res = await fetch(request.url, {
          method: request.method ?? 'GET',
          headers: { 'User-Agent': defaults.userAgent, ...request.headers },
          body: request.body,
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (e) {
        if (e instanceof Error && e.name === 'TimeoutError') {
          throw upstreamError(`Network error: timed out after ${timeoutMs}ms`, e);
        }
        throw upstreamError(`Network error: ${failureReason(e)}`, e);
      }

      const headers: Record<string, string> = {};
      res.headers.forEach((value, key) => { headers[key] = value; });
      let body: Buffer;
      try {
        body = Buffer.from(await res.arrayBuffer());
      } catch (e) {
        throw upstreamError(`Network error: ${failureReason(e)}`, e);
      }
      return { status: res.status, ok: res.ok, headers, body };
    },
  };
}
