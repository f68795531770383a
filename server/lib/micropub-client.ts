import type { MicropubRequest } from "@server/lib/micropub-request";

export type MicropubResponse = {
  status: number;
  body: string;
  /** Header values keyed by canonical name, e.g. `Location`. */
  headers: Record<string, string[]>;
  /** Set when the request never produced an HTTP response. */
  error?: string;
};

export interface PublisherClient {
  post(
    endpoint: string,
    request: MicropubRequest,
    accessToken: string,
    expectLocation?: boolean,
  ): Promise<MicropubResponse>;
}

export type MicropubClientOptions = {
  fetch?: typeof fetch;
  userAgent?: string;
};

function canonicalHeaderName(name: string): string {
  return name
    .split("-")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("-");
}

function collectHeaders(headers: Headers): Record<string, string[]> {
  const collected: Record<string, string[]> = {};
  headers.forEach((value, name) => {
    const key = canonicalHeaderName(name);
    collected[key] = [...(collected[key] ?? []), value];
  });
  return collected;
}

/**
 * Micropub client backed by fetch. Requests are sent as JSON with the user's
 * bearer token. Transport failures resolve to a response with `status: 0`
 * and `error` set instead of rejecting; there is no retry.
 */
export function createMicropubClient(
  options: MicropubClientOptions = {},
): PublisherClient {
  const fetchImpl = options.fetch ?? fetch;
  const userAgent = options.userAgent ?? "reading-log/0.1";

  return {
    async post(endpoint, request, accessToken, expectLocation = false) {
      try {
        const response = await fetchImpl(endpoint, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${accessToken}`,
            "Content-Type": "application/json",
            Accept: "application/json",
            "User-Agent": userAgent,
          },
          body: JSON.stringify(request),
          // The Location of a 201/202 is the post's URL; following a redirect
          // would lose it.
          redirect: expectLocation ? "manual" : "follow",
        });

        return {
          status: response.status,
          body: await response.text(),
          headers: collectHeaders(response.headers),
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Micropub request to ${endpoint} failed:`, message);
        return { status: 0, body: "", headers: {}, error: message };
      }
    },
  };
}
