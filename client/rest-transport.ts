import type { ClientConfiguration } from "./configuration";
import {
  AlreadyFriendsError,
  NotAuthenticatedError,
  NotFoundError,
  NotFriendsError,
  RateLimitedError,
  UnavailableError,
  UnexpectedResponseError,
} from "./errors";
import { isObject } from "./payload-readers";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | readonly string[] | null | undefined;

export type QueryParams = Readonly<Record<string, QueryValue>>;

export interface RestResponse {
  readonly status: number;
  readonly body: unknown;
}

/**
 * Narrow HTTP surface the resource layer depends on. Implementations resolve
 * only for 2xx responses and reject with a `RequestError` otherwise.
 */
export interface RestTransport {
  readonly request: (
    path: string,
    method?: HttpMethod,
    params?: QueryParams,
    body?: unknown,
  ) => Promise<RestResponse>;
}

const NOT_FRIENDS_MESSAGE = "These users are not friends";
const ALREADY_FRIENDS_MESSAGE = "Users are already friends!";

export const readErrorMessage = (body: unknown): string | null => {
  if (!isObject(body)) {
    return typeof body === "string" && body.length > 0 ? body : null;
  }
  const error = body.error;
  if (typeof error === "string") {
    return error;
  }
  if (isObject(error) && typeof error.message === "string") {
    return error.message;
  }
  return null;
};

export const raiseForStatus = (path: string, status: number, body: unknown): void => {
  const message = readErrorMessage(body);

  switch (status) {
    case 400:
      // The server wraps some messages in an extra pair of quotes.
      if (message?.replace(/^"|"$/g, "") === NOT_FRIENDS_MESSAGE) {
        throw new NotFriendsError(path);
      }
      if (message?.replace(/^"|"$/g, "") === ALREADY_FRIENDS_MESSAGE) {
        throw new AlreadyFriendsError(path);
      }
      break;
    case 401:
      throw new NotAuthenticatedError(path, message ?? "Request requires authentication.");
    case 404:
      throw new NotFoundError(path, message ?? `Resource ${path} was not found.`);
    case 429:
      throw new RateLimitedError(path);
    case 502:
    case 503:
    case 504:
      throw new UnavailableError(path, status, message ?? `Service unavailable (${status}).`);
    default:
      break;
  }

  if (status < 200 || status >= 300) {
    throw new UnexpectedResponseError(
      path,
      status,
      body,
      `Request to ${path} failed with status ${status}${message ? `: ${message}` : ""}`,
    );
  }

  if (isObject(body) && body.requiresTwoFactorAuth !== undefined) {
    throw new NotAuthenticatedError(path, "Account requires two-factor authentication.");
  }
};

export const buildQueryString = (params: QueryParams): string => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const entry of value) {
        search.append(key, entry);
      }
      continue;
    }
    search.append(key, String(value));
  }
  return search.toString();
};

const parseBody = (text: string): unknown => {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
};

export class FetchRestTransport implements RestTransport {
  constructor(private readonly configuration: ClientConfiguration) {}

  async request(
    path: string,
    method: HttpMethod = "GET",
    params: QueryParams = {},
    body?: unknown,
  ): Promise<RestResponse> {
    const query = buildQueryString({ ...params, apiKey: this.configuration.apiKey });
    const url = `${this.configuration.apiBaseUrl}${path}${query ? `?${query}` : ""}`;

    const headers: Record<string, string> = {
      "User-Agent": this.configuration.userAgent,
      Cookie: `auth=${this.configuration.authToken}`,
      Accept: "application/json",
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      throw new UnavailableError(path, null, `Request to ${path} could not be sent.`, { cause: error });
    }

    const payload = parseBody(await response.text());
    raiseForStatus(path, response.status, payload);
    return { status: response.status, body: payload };
  }
}
