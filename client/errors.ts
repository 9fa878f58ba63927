export class ClientError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type SchemaViolationReason =
  | "ReservedKeyCollision"
  | "MissingOrUnexpectedField"
  | "MalformedEncodedField"
  | "InvalidFieldType";

export class SchemaViolation extends ClientError {
  constructor(
    public readonly reason: SchemaViolationReason,
    public readonly objectType: string,
    public readonly key: string | null,
    detail: string,
    options?: { readonly cause?: unknown },
  ) {
    super(`${objectType}: ${detail}`, options);
  }
}

export class LocationParseError extends ClientError {
  constructor(
    public readonly raw: string,
    detail: string,
  ) {
    super(`Unable to parse location "${raw}": ${detail}`);
  }
}

export class ChannelAlreadyOpenError extends ClientError {
  constructor() {
    super("A push channel is already open or connecting.");
  }
}

export class ChannelError extends ClientError {}

export class UnknownHookError extends ClientError {
  constructor(public readonly hook: string) {
    super(`Unknown presence hook "${hook}".`);
  }
}

export type RequestErrorKind =
  | "NotFound"
  | "RateLimited"
  | "Unavailable"
  | "NotAuthenticated"
  | "BadRequest"
  | "Unexpected";

export class RequestError extends ClientError {
  constructor(
    public readonly kind: RequestErrorKind,
    public readonly status: number | null,
    public readonly path: string,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NotFoundError extends RequestError {
  constructor(path: string, message: string) {
    super("NotFound", 404, path, message);
  }
}

export class RateLimitedError extends RequestError {
  constructor(path: string) {
    super("RateLimited", 429, path, "You are being rate-limited.");
  }
}

export class UnavailableError extends RequestError {
  constructor(
    path: string,
    status: number | null,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super("Unavailable", status, path, message, options);
  }
}

export class NotAuthenticatedError extends RequestError {
  constructor(path: string, message: string) {
    super("NotAuthenticated", 401, path, message);
  }
}

export class NotFriendsError extends RequestError {
  constructor(path: string) {
    super("BadRequest", 400, path, "These users are not friends.");
  }
}

export class AlreadyFriendsError extends RequestError {
  constructor(path: string) {
    super("BadRequest", 400, path, "Users are already friends.");
  }
}

export class UnexpectedResponseError extends RequestError {
  constructor(
    path: string,
    status: number | null,
    public readonly body: unknown,
    message: string,
  ) {
    super("Unexpected", status, path, message);
  }
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
