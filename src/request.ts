import {
  ApiError,
  AuthenticationError,
  ConnectionError,
  ResponseDecodeError,
  RssReaderError,
  describeError,
} from "./errors.js";
import { createSubsystemLogger } from "./logging/subsystem.js";
import { isJsonRecord } from "./models/schema.js";
import { resolveApiUrl } from "./utils/base-url.js";

const log = createSubsystemLogger("request");

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Largest delay `setTimeout` honours; anything above fires at once. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const DEFAULT_AUTH_ERROR_MESSAGE = "Invalid API key or authentication required";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type QueryValue = string | number | boolean | undefined;

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type RequestExecutorOptions = {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
};

export type ExecuteOptions = {
  method?: HttpMethod;
  query?: Record<string, QueryValue>;
  body?: unknown;
};

export interface RequestExecutor {
  readonly apiUrl: string;
  execute: (endpoint: string, opts?: ExecuteOptions) => Promise<unknown>;
}

function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}

export function buildRequestUrl(
  apiUrl: string,
  endpoint: string,
  query?: Record<string, QueryValue>,
): string {
  const url = `${apiUrl}/${endpoint.replace(/^\/+/, "")}`;
  if (!query) {
    return url;
  }
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) {
      continue;
    }
    search.append(key, String(value));
  }
  const qs = search.toString();
  return qs ? `${url}?${qs}` : url;
}

/** Pulls `error` out of a JSON error body; anything else yields undefined. */
async function readErrorMessage(res: Response): Promise<string | undefined> {
  let text: string;
  try {
    text = await res.text();
  } catch {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (isJsonRecord(parsed) && typeof parsed.error === "string" && parsed.error) {
      return parsed.error;
    }
  } catch {
    // not JSON
  }
  return undefined;
}

function resolveTimeout(timeoutMs: number | undefined): number {
  if (timeoutMs === undefined) {
    return DEFAULT_TIMEOUT_MS;
  }
  if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new RssReaderError(
      `timeoutMs must be an integer between 1 and ${MAX_TIMEOUT_MS}, got ${timeoutMs}`,
    );
  }
  return timeoutMs;
}

function parseJsonBody(text: string, res: Response, url: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new ResponseDecodeError(
      `Response from ${url} is not valid JSON (status ${res.status})`,
      { cause: err },
    );
  }
}

export function createRequestExecutor(options: RequestExecutorOptions): RequestExecutor {
  const apiUrl = resolveApiUrl(options.baseUrl);
  const fetchFn = options.fetchFn ?? fetch;
  const timeoutMs = resolveTimeout(options.timeoutMs);
  const headers: Readonly<Record<string, string>> = Object.freeze({
    "X-API-Key": options.apiKey,
    "Content-Type": "application/json",
  });

  const execute = async (endpoint: string, opts: ExecuteOptions = {}): Promise<unknown> => {
    const method: string = opts.method ?? "GET";
    if (!isHttpMethod(method)) {
      throw new RssReaderError(`Unsupported HTTP method: ${method}`);
    }
    // Only GET carries query parameters.
    const url = buildRequestUrl(apiUrl, endpoint, method === "GET" ? opts.query : undefined);

    const init: RequestInit = { method, headers: { ...headers } };
    if ((method === "POST" || method === "PUT") && opts.body !== undefined) {
      init.body = JSON.stringify(opts.body);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    init.signal = controller.signal;

    const transportFailure = (err: unknown): ConnectionError => {
      const detail = controller.signal.aborted
        ? `request timed out after ${timeoutMs}ms`
        : describeError(err);
      log.warn(`${method} ${url} failed: ${detail}`);
      return new ConnectionError(`Connection error: ${detail}`, { cause: err });
    };

    log.debug(`${method} ${url}`);
    try {
      let res: Response;
      try {
        res = await fetchFn(url, init);
      } catch (err) {
        throw transportFailure(err);
      }

      if (!res.ok) {
        const message = await readErrorMessage(res);
        log.warn(`${method} ${url} returned ${res.status}`);
        if (res.status === 401) {
          throw new AuthenticationError(message ?? DEFAULT_AUTH_ERROR_MESSAGE);
        }
        throw new ApiError(res.status, message);
      }

      let text: string;
      try {
        text = await res.text();
      } catch (err) {
        throw transportFailure(err);
      }
      return parseJsonBody(text, res, url);
    } finally {
      clearTimeout(timeout);
    }
  };

  return { apiUrl, execute };
}
