// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/adapters/http/fetch-http-client`
 * Purpose: HttpClient implementation over global fetch.
 * Scope: JSON POST with a per-request timeout. Does not interpret vendor status or retry.
 * Invariants:
 *   - Body is always read as text once; json() parses that text.
 *   - Non-2xx responses are returned, not thrown. The collector decides what they mean.
 *   - Network errors and timeouts propagate to the caller.
 * Side-effects: IO (HTTP requests)
 * Links: packages/reporting-core/src/ports.ts
 * @internal
 */

import type { HttpClient, HttpResponse } from "@lp-reporting/reporting-core";

export interface FetchHttpClientConfig {
  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs?: number;
  /** Injected for tests; defaults to global fetch */
  readonly fetchImpl?: typeof fetch;
}

export class HttpTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "HttpTimeoutError";
  }
}

export class FetchHttpClient implements HttpClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: FetchHttpClientConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async post(
    url: string,
    headers: Readonly<Record<string, string>>,
    body: unknown
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();

      return {
        statusCode: response.status,
        text,
        json: (): unknown => JSON.parse(text),
      };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new HttpTimeoutError(url, this.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
