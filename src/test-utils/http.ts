import { vi } from "vitest";

export type StubRoute = {
  readonly status?: number;
  readonly body?: string;
  readonly headers?: Readonly<Record<string, string>>;
};

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/**
 * Builds a `fetch` replacement that answers from a route table.
 * Keys are either `"<METHOD> <url>"` or a bare URL matching any method.
 * Unknown URLs answer 404. HEAD responses never carry a body.
 */
export function createFetchStub(routes: Readonly<Record<string, StubRoute>>) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    if (init?.signal?.aborted) {
      throw new DOMException("This operation was aborted", "AbortError");
    }

    const url = requestUrl(input);
    const method = init?.method ?? "GET";
    const route = routes[`${method} ${url}`] ?? routes[url];

    if (!route) {
      return new Response(method === "HEAD" ? null : "not found", { status: 404 });
    }

    return new Response(method === "HEAD" ? null : (route.body ?? ""), {
      status: route.status ?? 200,
      headers: { ...route.headers },
    });
  });
}

export type FetchStub = ReturnType<typeof createFetchStub>;

/**
 * Lists the `"<METHOD> <url>"` pairs a stub has been called with, in order.
 */
export function requestedUrls(stub: FetchStub): Array<string> {
  return stub.mock.calls.map(([input, init]) => `${init?.method ?? "GET"} ${requestUrl(input)}`);
}
