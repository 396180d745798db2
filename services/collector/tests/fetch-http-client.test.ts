// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@lp-reporting/collector-service/tests/fetch-http-client`
 * Purpose: Unit tests for the fetch-backed HttpClient.
 * Scope: Test-only. fetch is injected; nothing leaves the process.
 * Invariants: none
 * Side-effects: none
 * Links: services/collector/src/adapters/http/fetch-http-client.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  FetchHttpClient,
  HttpTimeoutError,
} from "../src/adapters/http/fetch-http-client.js";

interface Call {
  readonly url: string;
  readonly init: RequestInit | undefined;
}

function recordingFetch(response: () => Response) {
  const calls: Call[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return response();
  };
  return { calls, fetchImpl };
}

describe("FetchHttpClient", () => {
  it("posts a JSON body and exposes status, text and json()", async () => {
    const { calls, fetchImpl } = recordingFetch(
      () => new Response('{"status":"OK","data":[]}', { status: 200 })
    );
    const client = new FetchHttpClient({ fetchImpl });

    const response = await client.post(
      "https://lastpass.com/enterpriseapi.php",
      { "X-Trace": "t1" },
      { cmd: "reporting" }
    );

    expect(response.statusCode).toBe(200);
    expect(response.text).toBe('{"status":"OK","data":[]}');
    expect(response.json()).toEqual({ status: "OK", data: [] });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("https://lastpass.com/enterpriseapi.php");
    expect(calls[0]?.init?.method).toBe("POST");
    expect(calls[0]?.init?.body).toBe('{"cmd":"reporting"}');
    expect(calls[0]?.init?.headers).toEqual({
      "Content-Type": "application/json",
      "X-Trace": "t1",
    });
  });

  it("returns non-2xx responses instead of throwing", async () => {
    const { fetchImpl } = recordingFetch(
      () => new Response("Service Unavailable", { status: 503 })
    );
    const client = new FetchHttpClient({ fetchImpl });

    const response = await client.post("https://example.com", {}, {});

    expect(response.statusCode).toBe(503);
    expect(response.text).toBe("Service Unavailable");
    expect(() => response.json()).toThrow(SyntaxError);
  });

  it("turns an aborted request into HttpTimeoutError", async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const abort = new Error("This operation was aborted");
          abort.name = "AbortError";
          reject(abort);
        });
      });
    const client = new FetchHttpClient({ fetchImpl, timeoutMs: 5 });

    const error = await client
      .post("https://example.com", {}, {})
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpTimeoutError);
    expect(error instanceof Error && error.name).toBe("HttpTimeoutError");
    expect(error instanceof HttpTimeoutError && error.message).toBe(
      "Request to https://example.com timed out after 5ms"
    );
  });

  it("propagates network errors unchanged", async () => {
    const failure = new TypeError("fetch failed");
    const fetchImpl: typeof fetch = async () => {
      throw failure;
    };
    const client = new FetchHttpClient({ fetchImpl });

    await expect(client.post("https://example.com", {}, {})).rejects.toBe(
      failure
    );
  });
});
