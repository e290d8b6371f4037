// CHANGE: Shared HTTP client with rate-limit recovery for catalog and manifest requests.
// WHY: A 429 from the catalog API stalls the run until it clears; every other non-2xx is fatal there.

import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { NET } from "../config.js";
import { RateLimited, RemoteUnavailable } from "../errors.js";
import { debug } from "../logger.js";

const RATE_LIMIT_STATUS = 429;

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "hexpm-mirror/1.0"
  }
});

export interface RequestOptions {
  readonly pauseMs?: number;
  readonly signal?: AbortSignal;
}

export interface HttpResult<T> {
  readonly data: T;
  readonly headers: Record<string, string>;
  readonly status: number;
  readonly rateLimitPauses: number;
}

export function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

/**
 * Status code carried by a failed axios request, if the server answered at all.
 */
export function responseStatus(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    }
  }
  return out;
}

async function executeWithRateLimitRetry<T>(
  operation: () => Promise<AxiosResponse<T>>,
  url: string,
  options: RequestOptions
): Promise<{ readonly response: AxiosResponse<T>; readonly pauses: number }> {
  const pauseMs = options.pauseMs ?? NET.RATE_LIMIT_PAUSE_MS;
  let pauses = 0;
  for (;;) {
    options.signal?.throwIfAborted();
    try {
      const response = await operation();
      return { response, pauses };
    } catch (rawError) {
      const status = responseStatus(rawError);
      if (status !== RATE_LIMIT_STATUS) {
        throw new RemoteUnavailable(url, status, { cause: rawError });
      }
      pauses += 1;
      debug(`HTTP 429 for ${url}, pause ${pauses} of ${pauseMs}ms before retrying.`);
      await sleep(pauseMs);
      if (options.signal?.aborted) {
        throw new RateLimited(url);
      }
    }
  }
}

/**
 * Perform GET request expecting JSON payload, retrying indefinitely while rate limited.
 *
 * @throws RemoteUnavailable on any other failure.
 */
export async function getJson<T>(url: string, options: RequestOptions = {}): Promise<HttpResult<T>> {
  const { response, pauses } = await executeWithRateLimitRetry(
    () => httpClient.get<T>(url, { headers: { Accept: "application/json" }, signal: options.signal }),
    url,
    options
  );
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status,
    rateLimitPauses: pauses
  };
}

/**
 * Perform GET request expecting a text body, retrying indefinitely while rate limited.
 *
 * @throws RemoteUnavailable on any other failure.
 */
export async function getText(url: string, options: RequestOptions = {}): Promise<HttpResult<string>> {
  const { response, pauses } = await executeWithRateLimitRetry(
    () => httpClient.get<string>(url, { responseType: "text", signal: options.signal }),
    url,
    options
  );
  return {
    data: String(response.data),
    headers: normaliseHeaders(response.headers),
    status: response.status,
    rateLimitPauses: pauses
  };
}

/**
 * Perform a single GET request expecting binary payload. No retry: failures surface to the caller.
 */
export async function getBinary(
  url: string
): Promise<{ readonly data: Buffer; readonly headers: Record<string, string>; readonly status: number }> {
  const response = await httpClient.get<ArrayBuffer>(url, { responseType: "arraybuffer" });
  return {
    data: Buffer.from(response.data),
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

export { httpClient };
