/**
 * Helpers for tests that stub the global fetch
 */

export function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number, statusText: string): Response {
  return new Response(body, { status, statusText });
}

type FetchCall = Parameters<typeof fetch>;

export function requestBody(call: FetchCall): unknown {
  const body = call[1]?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

export function requestHeader(call: FetchCall, name: string): string | null {
  return new Headers(call[1]?.headers).get(name);
}

export function requestUrl(call: FetchCall): string {
  const input = call[0];
  return typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
}
