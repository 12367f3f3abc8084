import type { FetchImpl } from '../../llm/completionClient.js';

export interface CapturedCall {
  url: string;
  method?: string;
  headers: Headers;
  body: unknown;
}

export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function completionResponse(text: string): Response {
  return jsonResponse({ choices: [{ text }] });
}

export function createFetchStub(respond: (callIndex: number) => Response | Promise<Response>) {
  const calls: CapturedCall[] = [];

  const fetchImpl: FetchImpl = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    return respond(calls.length - 1);
  };

  return { fetchImpl, calls };
}

export function createDeferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}
