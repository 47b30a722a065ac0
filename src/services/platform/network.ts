/**
 * Network layer interface and implementation.
 *
 * HttpClient wraps the global fetch with timeout, abort and header support so
 * services can be tested against an in-memory mock.
 */

import type { Logger } from "../logging";
import { getErrorMessage } from "../../shared/error-utils";

// ============================================================================
// HTTP Client Interface
// ============================================================================

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /** Timeout in milliseconds. Default: 5000 */
  readonly timeout?: number;
  /** External abort signal to cancel the request */
  readonly signal?: AbortSignal;
  /** Request headers */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * Response with its body fully read.
 */
export interface HttpResponse {
  readonly status: number;
  /** True for 2xx statuses. */
  readonly ok: boolean;
  readonly body: Uint8Array;
}

/**
 * HTTP client for GET requests with timeout support.
 * Redirects are followed. The timeout covers the whole exchange, body included.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   *
   * @param url - URL to fetch
   * @param options - Request options
   * @returns Status and body
   * @throws DOMException with name "AbortError" on timeout or abort, also while
   *   the body is still arriving
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch(url, {
   *   timeout: 10000,
   *   headers: { Accept: "application/vnd.github+json" },
   * });
   * if (response.ok) {
   *   const text = new TextDecoder().decode(response.body);
   * }
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

// ============================================================================
// Configuration
// ============================================================================

export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 5000 */
  readonly defaultTimeout?: number;
}

// ============================================================================
// Default Implementation
// ============================================================================

export class DefaultNetworkLayer implements HttpClient {
  private readonly config: Required<NetworkLayerConfig>;
  private readonly logger: Logger;

  constructor(logger: Logger, config: NetworkLayerConfig = {}) {
    this.logger = logger;
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 5000,
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;
    const externalSignal = options?.signal;

    this.logger.debug("Fetch", { url, method: "GET" });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }, timeout);

    const onExternalAbort = (): void => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    };

    if (externalSignal) {
      if (externalSignal.aborted) {
        controller.abort();
      } else {
        externalSignal.addEventListener("abort", onExternalAbort);
      }
    }

    try {
      const response = await fetch(url, {
        method: "GET",
        redirect: "follow",
        signal: controller.signal,
        ...(options?.headers !== undefined && { headers: { ...options.headers } }),
      });
      const body = new Uint8Array(await untilAborted(response.arrayBuffer(), controller.signal));
      this.logger.debug("Fetch complete", { url, status: response.status, size: body.length });
      return { status: response.status, ok: response.ok, body };
    } catch (error) {
      this.logger.warn("Fetch failed", { url, error: getErrorMessage(error) });
      throw error;
    } finally {
      clearTimeout(timeoutId);
      if (externalSignal) {
        externalSignal.removeEventListener("abort", onExternalAbort);
      }
    }
  }
}

/**
 * Settle with `promise`, or reject with an AbortError once `signal` aborts.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new DOMException("Aborted", "AbortError"));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new DOMException("Aborted", "AbortError"));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
