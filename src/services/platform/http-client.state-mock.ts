/**
 * Behavioral mock for HttpClient following the mock.$ state pattern.
 *
 * Responses are configured per URL as plain data. Every call is recorded,
 * including calls that fail because the network is down.
 *
 * Matchers (auto-registered on import): toHaveRequested, toHaveRequestCount,
 * toHaveNoRequests.
 */

import { expect } from "vitest";
import type { HttpClient, HttpRequestOptions, HttpResponse } from "./network";
import type {
  MockState,
  MockWithState,
  Snapshot,
  MatcherResult,
  MatcherImplementationsFor,
} from "../../test/state-mock";

export interface HttpRequestRecord {
  readonly url: string;
  readonly options?: HttpRequestOptions;
}

export interface ConfiguredResponse {
  /** Text is UTF-8 encoded; bytes are copied per request. Default: empty */
  readonly body?: string | Uint8Array;
  /** Default: 200 */
  readonly status?: number;
}

export interface HttpClientMockState extends MockState {
  readonly requests: readonly HttpRequestRecord[];
}

export type MockHttpClient = HttpClient &
  MockWithState<HttpClientMockState> & {
    setResponse(url: string, config: ConfiguredResponse): void;
    /** Every later fetch rejects with "Network is down". */
    simulateNetworkDown(): void;
  };

export interface MockHttpClientOptions {
  /** Responses by exact URL. */
  readonly responses?: Readonly<Record<string, ConfiguredResponse>>;
  /** Used for URLs without a configured response. Default: 200 with empty body */
  readonly defaultResponse?: ConfiguredResponse;
}

function toBytes(body: string | Uint8Array | undefined): Uint8Array {
  if (body === undefined) return new Uint8Array();
  return typeof body === "string" ? new TextEncoder().encode(body) : new Uint8Array(body);
}

/**
 * Create a behavioral mock HttpClient.
 *
 * @example
 * const httpClient = createMockHttpClient({
 *   responses: { "https://api.github.com/repos/vulnera-rs/adapter/releases": { body: "[]" } },
 *   defaultResponse: { status: 404 },
 * });
 * await source.fetchLatestStableVersion();
 * expect(httpClient).toHaveRequestCount(1);
 */
export function createMockHttpClient(options: MockHttpClientOptions = {}): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const responses = new Map<string, ConfiguredResponse>(Object.entries(options.responses ?? {}));
  const defaultResponse = options.defaultResponse ?? {};
  let networkDown = false;

  const state: HttpClientMockState = {
    get requests(): readonly HttpRequestRecord[] {
      return requests;
    },
    snapshot(): Snapshot {
      return { __brand: "Snapshot", value: this.toString() };
    },
    toString(): string {
      const urls = requests.map((r) => r.url).join(", ") || "(none)";
      return `${requests.length} request(s): ${urls}${networkDown ? " [network down]" : ""}`;
    },
  };

  return {
    $: state,

    async fetch(url: string, fetchOptions?: HttpRequestOptions): Promise<HttpResponse> {
      requests.push({ url, ...(fetchOptions !== undefined && { options: fetchOptions }) });
      if (networkDown) {
        throw new Error("Network is down");
      }
      const config = responses.get(url) ?? defaultResponse;
      const status = config.status ?? 200;
      return { status, ok: status >= 200 && status < 300, body: toBytes(config.body) };
    },

    setResponse(url: string, config: ConfiguredResponse): void {
      responses.set(url, config);
    },

    simulateNetworkDown(): void {
      networkDown = true;
    },
  };
}

// =============================================================================
// Custom Matchers
// =============================================================================

interface HttpClientMatchers {
  toHaveRequested(url: string): void;
  toHaveRequestCount(count: number): void;
  toHaveNoRequests(): void;
}

declare module "vitest" {
  interface Assertion<T> extends HttpClientMatchers {}
}

export const httpClientMatchers: MatcherImplementationsFor<MockHttpClient, HttpClientMatchers> = {
  toHaveRequested(received, url) {
    const pass = received.$.requests.some((r) => r.url === url);
    return {
      pass,
      message: (): string =>
        pass
          ? `Expected not to have requested ${url}. ${received.$.toString()}`
          : `Expected to have requested ${url}. ${received.$.toString()}`,
    } satisfies MatcherResult;
  },

  toHaveRequestCount(received, count) {
    const actual = received.$.requests.length;
    const pass = actual === count;
    return {
      pass,
      message: (): string =>
        pass
          ? `Expected not to have ${count} request(s)`
          : `Expected ${count} request(s), got ${received.$.toString()}`,
    } satisfies MatcherResult;
  },

  toHaveNoRequests(received) {
    const pass = received.$.requests.length === 0;
    return {
      pass,
      message: (): string =>
        pass ? "Expected requests, but had none" : `Expected no requests, got ${received.$.toString()}`,
    } satisfies MatcherResult;
  },
};

expect.extend(httpClientMatchers);
