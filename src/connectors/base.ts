import { logger } from "../logger";

export interface RequestOptions {
  url: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export interface PostJsonOptions extends RequestOptions {
  body: unknown;
}

export interface FetchResult<T> {
  data: T | null;
  success: boolean;
  error?: string;
  rateLimited: boolean;
  responseTimeMs: number;
  statusCode?: number;
}

type BodyReader<T> = (response: Response) => Promise<T>;

/**
 * One attempt, bounded by `timeoutMs`. Failures come back as a result object,
 * never as a thrown error; the pipeline does not retry upstream calls.
 */
async function request<T>(
  options: RequestOptions,
  init: { method: string; headers: Record<string, string>; body?: string },
  readBody: BodyReader<T>,
): Promise<FetchResult<T>> {
  const { url, timeoutMs } = options;
  const startTime = Date.now();
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: init.method,
      body: init.body,
      signal: controller.signal,
      headers: { ...init.headers, ...options.headers },
    });

    if (!response.ok) {
      const rateLimited = response.status === 429;
      const error = rateLimited
        ? "Rate limited (429)"
        : `HTTP ${response.status}: ${response.statusText}`;
      logger.warn(`${error} on ${url}`);
      return {
        data: null,
        success: false,
        error,
        rateLimited,
        responseTimeMs: Date.now() - startTime,
        statusCode: response.status,
      };
    }

    // Timeout stays armed until the body is read; a stalled body is aborted too.
    const data = await readBody(response);

    return {
      data,
      success: true,
      rateLimited: false,
      responseTimeMs: Date.now() - startTime,
      statusCode: response.status,
    };
  } catch (error) {
    const isAbort = error instanceof Error && error.name === "AbortError";
    const message = isAbort ? `Timeout after ${timeoutMs}ms` : String(error);
    logger.warn(`Fetch error on ${url}: ${message}`);

    return {
      data: null,
      success: false,
      error: message,
      rateLimited: false,
      responseTimeMs: Date.now() - startTime,
    };
  } finally {
    clearTimeout(timeout);
  }
}

export function postJson(options: PostJsonOptions): Promise<FetchResult<unknown>> {
  return request<unknown>(
    options,
    {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify(options.body),
    },
    (response) => response.json(),
  );
}

export function fetchText(options: RequestOptions): Promise<FetchResult<string>> {
  return request<string>(
    options,
    {
      method: "GET",
      headers: { Accept: "text/html,application/xhtml+xml" },
    },
    (response) => response.text(),
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
