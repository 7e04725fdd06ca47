import { logger } from "../utils/logger.js";
import { errorMessage, TimeoutError } from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";

/** The subset of fetch the evidence sources use; tests pass a fake */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number | undefined,
    /** Network failures, timeouts, 429 and 5xx are worth one retry */
    public readonly transient: boolean
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export interface GetJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  label: string;
}

/**
 * GET a URL and parse the JSON body within the time budget. The request is
 * aborted at the deadline. Throws HttpError for non-2xx responses and
 * network failures.
 */
export async function getJson(
  fetchFn: FetchFn,
  url: string,
  options: GetJsonOptions
): Promise<unknown> {
  logger.logCurl("GET", url, options.headers);

  const request = async (): Promise<unknown> => {
    let response: Response;
    try {
      response = await fetchFn(url, {
        headers: options.headers,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (e) {
      throw new HttpError(`${options.label}: ${errorMessage(e)}`, undefined, true);
    }
    if (!response.ok) {
      throw new HttpError(
        `${options.label} failed: ${response.status} ${response.statusText}`,
        response.status,
        response.status === 429 || response.status >= 500
      );
    }
    return response.json();
  };

  try {
    return await withTimeout(request(), options.timeoutMs, options.label);
  } catch (e) {
    if (e instanceof TimeoutError) {
      throw new HttpError(e.message, undefined, true);
    }
    throw e;
  }
}

export function isTransient(e: unknown): boolean {
  return e instanceof HttpError && e.transient;
}
