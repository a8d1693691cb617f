export interface FetchResponseFixture {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface RecordedFetchCall {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string | null;
  form: Record<string, string> | null;
}

export type FetchHandler = (
  call: RecordedFetchCall
) => FetchResponseFixture | Promise<FetchResponseFixture>;

export interface FetchFixture {
  fetch: typeof globalThis.fetch;
  calls: RecordedFetchCall[];
  callsTo(pathOrUrl: string): RecordedFetchCall[];
}

function normalizeInput(input: string | URL | Request) {
  if (typeof input === "string") {
    return input;
  }
  if (input instanceof URL) {
    return input.toString();
  }
  if (input instanceof Request) {
    return input.url;
  }
  throw new Error(`Unsupported fetch input type: ${typeof input}`);
}

function readBody(body: RequestInit["body"]): string | null {
  if (typeof body === "string") {
    return body;
  }
  if (body instanceof URLSearchParams) {
    return body.toString();
  }
  return null;
}

function readHeaders(init: RequestInit | undefined) {
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

function parseForm(body: string | null, headers: Record<string, string>) {
  if (body === null || !headers["content-type"]?.startsWith("application/x-www-form-urlencoded")) {
    return null;
  }

  const form: Record<string, string> = {};
  new URLSearchParams(body).forEach((value, key) => {
    form[key] = value;
  });
  return form;
}

function buildJsonResponse({ status = 200, body = {}, headers = {} }: FetchResponseFixture) {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "content-type": "application/json",
      ...headers
    }
  });
}

/**
 * In-process stand-in for `fetch`. Routes are keyed by `"METHOD target"` or by
 * a bare target, where the target is a full URL (query string ignored) or a
 * pathname. A handler that throws makes the fetch reject, as a network failure
 * would.
 */
export function createFetchFixture(
  routes: Record<string, FetchResponseFixture | FetchHandler>,
  fallbackFixture: FetchResponseFixture = { status: 404, body: { code: "not_found" } }
): FetchFixture {
  const calls: RecordedFetchCall[] = [];

  const fetchFixture: typeof globalThis.fetch = async (
    input: string | URL | Request,
    init?: RequestInit
  ) => {
    const url = normalizeInput(input);
    const parsed = new URL(url);
    const method = (init?.method ?? "GET").toUpperCase();
    const headers = readHeaders(init);
    const body = readBody(init?.body);
    const call: RecordedFetchCall = {
      method,
      url,
      headers,
      body,
      form: parseForm(body, headers)
    };
    calls.push(call);

    if (init?.signal?.aborted) {
      throw init.signal.reason;
    }

    const withoutQuery = `${parsed.origin}${parsed.pathname}`;
    const candidates = [
      `${method} ${withoutQuery}`,
      `${method} ${parsed.pathname}`,
      withoutQuery,
      parsed.pathname
    ];
    const key = candidates.find((candidate) => candidate in routes);
    const route = key === undefined ? fallbackFixture : routes[key] ?? fallbackFixture;
    const fixture = typeof route === "function" ? await route(call) : route;

    return buildJsonResponse(fixture);
  };

  return {
    fetch: fetchFixture,
    calls,
    callsTo(pathOrUrl) {
      return calls.filter((call) => {
        const parsed = new URL(call.url);
        return (
          call.url === pathOrUrl ||
          `${parsed.origin}${parsed.pathname}` === pathOrUrl ||
          parsed.pathname === pathOrUrl
        );
      });
    }
  };
}

/** A promise whose settlement the test controls. */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((onResolve, onReject) => {
    resolve = onResolve;
    reject = onReject;
  });

  return { promise, resolve, reject };
}
