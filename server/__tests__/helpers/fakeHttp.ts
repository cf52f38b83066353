import { vi, type Mock } from "vitest";
import { makeProviderContext } from "../../provider/context";
import { ResilientFetch } from "../../provider/resilientFetch";
import type { ProviderContext } from "../../provider/types";

export type FakeRoute = {
  /** Matched against the start of the request URL. */
  prefix: string;
  body: unknown;
  status?: number;
};

function requestUrl(input: Parameters<typeof fetch>[0]): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * fetch stand-in answering from a fixed route table; unmatched URLs get a 404.
 */
export function routedFetch(routes: FakeRoute[]): Mock<typeof fetch> {
  return vi.fn<typeof fetch>(async (input) => {
    const url = requestUrl(input);
    const route = routes.find((candidate) => url.startsWith(candidate.prefix));
    if (!route) {
      return new Response(JSON.stringify({ message: "not found" }), { status: 404 });
    }
    return new Response(JSON.stringify(route.body), {
      status: route.status ?? 200,
      headers: { "Content-Type": "application/json" },
    });
  });
}

export function fakeProviderContext(routes: FakeRoute[]): { ctx: ProviderContext; fetchImpl: Mock<typeof fetch> } {
  const fetchImpl = routedFetch(routes);
  const ctx = makeProviderContext({
    http: new ResilientFetch({ fetchImpl, sleep: async () => {} }),
    now: () => new Date("2025-06-01T12:00:00Z"),
  });
  return { ctx, fetchImpl };
}

export function requestedUrls(fetchImpl: Mock<typeof fetch>): URL[] {
  return fetchImpl.mock.calls.map(([input]) => new URL(requestUrl(input)));
}
