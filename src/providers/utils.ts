/**
 * Shared Provider Utilities
 *
 * Common functionality extracted from search providers to reduce duplication
 * and ensure consistent behavior across all providers.
 */

import type { z } from "zod";
import type { EngineId } from "../core/types";
import { BackendError, RetrievalCancelledError } from "../core/types";

/**
 * Options for HTTP requests
 */
export interface FetchOptions {
  /** Request method */
  method: "GET" | "POST";
  /** Request headers */
  headers: Record<string, string>;
  /** Request body (for POST requests) */
  body?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Caller cancellation; aborting it raises RetrievalCancelledError */
  signal?: AbortSignal;
}

/**
 * Result of a fetch operation
 */
export interface FetchResult<T> {
  /** Parsed response data */
  data: T;
  /** Response status code */
  status: number;
  /** Time taken in milliseconds */
  tookMs: number;
}

/**
 * Get API key from environment variable
 *
 * @throws BackendError("auth_failure") if the variable is not set
 */
export function getApiKey(engineId: EngineId, envVarName: string): string {
  const apiKey = process.env[envVarName];
  if (!apiKey) {
    throw new BackendError(engineId, "auth_failure", `Missing environment variable: ${envVarName}`);
  }
  return apiKey;
}

/**
 * Map an HTTP status to a backend error kind
 */
export function kindForStatus(status: number): "auth_failure" | "rate_limited" | "unreachable" {
  if (status === 401 || status === 403) {
    return "auth_failure";
  }
  if (status === 429) {
    return "rate_limited";
  }
  return "unreachable";
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts
 *
 * A stubbed or misbehaving body stream may ignore the fetch signal, so every
 * await on the network is raced against it.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Perform an HTTP fetch with error handling, timeout and cancellation support
 *
 * The timeout and the caller's signal cover the whole exchange, body included.
 * The body is validated against `schema`; a response that is not JSON or does
 * not match raises BackendError("malformed").
 *
 * @throws BackendError on network, HTTP, parse or shape errors
 * @throws RetrievalCancelledError when `options.signal` aborts
 */
export async function fetchWithErrorHandling<S extends z.ZodTypeAny>(
  engineId: EngineId,
  url: string,
  options: FetchOptions,
  schema: S,
  providerDisplayName?: string,
): Promise<FetchResult<z.output<S>>> {
  const started = Date.now();
  const displayName = providerDisplayName ?? engineId;

  if (options.signal?.aborted) {
    throw new RetrievalCancelledError();
  }

  // Own controller so a timeout can be told apart from caller cancellation
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = options.timeoutMs
    ? setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeoutMs)
    : undefined;
  const onCallerAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onCallerAbort, { once: true });

  const abortError = (): Error | undefined => {
    if (options.signal?.aborted) {
      return new RetrievalCancelledError();
    }
    if (timedOut) {
      return new BackendError(engineId, "timeout", `${displayName} request timeout after ${options.timeoutMs}ms`);
    }
    return undefined;
  };

  try {
    let response: Response;
    try {
      response = await untilAborted(
        fetch(url, {
          method: options.method,
          headers: options.headers,
          body: options.body,
          signal: controller.signal,
        }),
        controller.signal,
      );
    } catch (error) {
      throw (
        abortError() ??
        new BackendError(
          engineId,
          "unreachable",
          `${displayName} network error: ${error instanceof Error ? error.message : String(error)}`,
        )
      );
    }

    // Handle HTTP errors
    if (!response.ok) {
      const errorBody = await untilAborted(response.text(), controller.signal).catch(() => "");
      throw (
        abortError() ??
        new BackendError(
          engineId,
          kindForStatus(response.status),
          `${displayName} API error: HTTP ${response.status} ${response.statusText}${errorBody ? ` - ${errorBody}` : ""}`,
          response.status,
        )
      );
    }

    let json: unknown;
    try {
      json = await untilAborted(response.json(), controller.signal);
    } catch (error) {
      throw (
        abortError() ??
        new BackendError(
          engineId,
          "malformed",
          `Invalid JSON response from ${displayName}: ${error instanceof Error ? error.message : String(error)}`,
          response.status,
        )
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const detail = first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "";
      throw new BackendError(
        engineId,
        "malformed",
        `Unexpected response shape from ${displayName}${detail ? ` (${detail})` : ""}`,
        response.status,
      );
    }

    return {
      data: parsed.data,
      status: response.status,
      tookMs: Date.now() - started,
    };
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    options.signal?.removeEventListener("abort", onCallerAbort);
  }
}

/**
 * Build a URL with query parameters
 *
 * Undefined values are skipped.
 */
export function buildUrl(
  baseUrl: string,
  params: Record<string, string | number | undefined>,
): string {
  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      searchParams.append(key, String(value));
    }
  }
  return `${baseUrl}?${searchParams.toString()}`;
}

/**
 * Join a base endpoint and a path without doubling slashes
 */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * Canonical form of a URL used for duplicate detection
 *
 * Lowercases scheme and host, drops `www.`, the fragment, default ports and a
 * trailing slash. Unparseable input is trimmed and lowercased.
 */
export function canonicalUrl(raw: string): string {
  const trimmed = raw.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return trimmed.toLowerCase();
  }

  const host = parsed.hostname.toLowerCase().replace(/^www\./, "");
  const port = parsed.port ? `:${parsed.port}` : "";
  const path = parsed.pathname.replace(/\/+$/, "");
  return `${parsed.protocol}//${host}${port}${path}${parsed.search}`;
}

/**
 * Hostname of a URL without `www.`, or undefined when unparseable
 */
export function hostOf(raw: string): string | undefined {
  try {
    return new URL(raw).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return undefined;
  }
}
