/**
 * Behavioral mock for HttpClient following the mock.$ state pattern.
 *
 * Provides:
 * - Request history tracking
 * - Response configuration per URL, fixed at creation
 * - Network error simulation
 * - Custom matchers (toHaveRequested, toHaveNoRequests)
 *
 * Matchers are auto-registered when this module is imported.
 */

import { expect } from "vitest";
import type { HttpClient, HttpRequestOptions } from "./network.js";
import type {
  MockState,
  MockWithState,
  Snapshot,
  MatcherResult,
  MatcherImplementationsFor,
} from "../../test/state-mock.js";

// =============================================================================
// Type Definitions
// =============================================================================

/** Record of an HTTP request made through the mock. */
export interface HttpRequestRecord {
  readonly url: string;
  readonly options: HttpRequestOptions | undefined;
}

/**
 * Response configuration - stores DATA, not Response objects.
 * Fresh Response constructed on each fetch() call.
 */
export interface ConfiguredResponse {
  readonly body?: string | Buffer;
  readonly status?: number; // Default: 200
  readonly headers?: Record<string, string>;
  readonly error?: Error; // Throw this instead of returning response
}

export interface HttpClientMockState extends MockState {
  readonly requests: readonly HttpRequestRecord[];
  readonly networkError: Error | null;
}

export type MockHttpClient = HttpClient &
  MockWithState<HttpClientMockState> & {
    simulateNetworkDown(): void;
  };

export interface MockHttpClientOptions {
  /** Pre-configured responses by exact URL. */
  readonly responses?: Record<string, ConfiguredResponse>;
  /** Default for unconfigured URLs. Default: { status: 404 } */
  readonly defaultResponse?: ConfiguredResponse;
}

// =============================================================================
// Factory Implementation
// =============================================================================

function toBody(body: string | Buffer | undefined): string | Uint8Array | null {
  if (body === undefined) return null;
  return typeof body === "string" ? body : new Uint8Array(body);
}

/**
 * Create a behavioral mock HttpClient for testing.
 *
 * @example Configure responses per URL
 * const httpClient = createMockHttpClient({
 *   responses: {
 *     "https://downloads.test/Miniforge3-Linux-x86_64.sh": { body: Buffer.from("#!/bin/sh") },
 *   },
 * });
 *
 * @example Simulate network down
 * const mock = createMockHttpClient();
 * mock.simulateNetworkDown();
 * await mock.fetch("https://downloads.test"); // throws Error
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const responses: ReadonlyMap<string, ConfiguredResponse> = new Map(
    Object.entries(options?.responses ?? {})
  );
  let networkError: Error | null = null;

  const defaultResponse: ConfiguredResponse = options?.defaultResponse ?? { status: 404 };

  const state: HttpClientMockState = {
    get requests(): readonly HttpRequestRecord[] {
      return requests;
    },
    get networkError(): Error | null {
      return networkError;
    },
    snapshot(): Snapshot {
      return {
        __brand: "Snapshot" as const,
        value: this.toString(),
      };
    },
    toString(): string {
      const urls = requests.map((r) => r.url).join(", ");
      const network = networkError ? ` [NETWORK DOWN: ${networkError.message}]` : "";
      return `${requests.length} request(s): ${urls || "(none)"}${network}`;
    },
  };

  return {
    $: state,

    async fetch(url: string, fetchOptions?: HttpRequestOptions): Promise<Response> {
      requests.push({ url, options: fetchOptions });

      if (networkError) {
        throw networkError;
      }
      if (fetchOptions?.signal?.aborted) {
        throw new DOMException("The operation was aborted.", "AbortError");
      }

      const config = responses.get(url) ?? defaultResponse;
      if (config.error) {
        throw config.error;
      }

      const init: ResponseInit =
        config.headers !== undefined
          ? { status: config.status ?? 200, headers: config.headers }
          : { status: config.status ?? 200 };
      return new Response(toBody(config.body), init);
    },

    simulateNetworkDown(): void {
      networkError = new TypeError("fetch failed");
    },
  };
}

// =============================================================================
// Custom Matchers
// =============================================================================

interface HttpClientMatchers {
  /** Assert that a specific URL was requested. Supports string or RegExp. */
  toHaveRequested(url: string | RegExp): void;
  /** Assert that no requests were made. */
  toHaveNoRequests(): void;
}

declare module "vitest" {
  interface Assertion<T> extends HttpClientMatchers {}
}

export const httpClientMatchers: MatcherImplementationsFor<MockHttpClient, HttpClientMatchers> = {
  toHaveRequested(received, url) {
    const requests = received.$.requests;
    const pass =
      url instanceof RegExp
        ? requests.some((r) => url.test(r.url))
        : requests.some((r) => r.url === url);

    return {
      pass,
      message: (): string => {
        const urls = requests.map((r) => r.url).join(", ") || "(none)";
        return pass
          ? `Expected not to have requested ${url}, but did. Requests: ${urls}`
          : `Expected to have requested ${url}, but didn't. Requests: ${urls}`;
      },
    } satisfies MatcherResult;
  },

  toHaveNoRequests(received) {
    const count = received.$.requests.length;
    const pass = count === 0;

    return {
      pass,
      message: (): string =>
        pass
          ? `Expected to have requests, but had none`
          : `Expected no requests, but had ${count}: ${received.$.toString()}`,
    } satisfies MatcherResult;
  },
};

// Auto-register matchers when this module is imported
expect.extend(httpClientMatchers);
