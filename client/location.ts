import { LocationParseError } from "./errors";
import { isObject } from "./payload-readers";

export const PUBLIC_INSTANCE_TYPE = "public";

/**
 * `bare` is a plain instance code, `typed` is `name~type`, `owned` is
 * `name~type(userId)~nonce(value)`.
 */
export type LocationForm = "bare" | "typed" | "owned";

export interface Location {
  readonly raw: string;
  readonly form: LocationForm;
  readonly worldId: string | null;
  readonly name: string;
  readonly type: string;
  readonly userId: string | null;
  readonly nonce: string | null;
}

const PARENTHESIZED = /^([^()]+)\(([^()]+)\)$/;
const NONCE_PREFIX = "nonce";

const LOCATION_FORMS: readonly string[] = ["bare", "typed", "owned"];

export const isLocation = (value: unknown): value is Location => {
  if (!isObject(value)) {
    return false;
  }
  return (
    typeof value.raw === "string" &&
    typeof value.name === "string" &&
    typeof value.form === "string" &&
    LOCATION_FORMS.includes(value.form)
  );
};

const countOccurrences = (value: string, needle: string): number =>
  value.split(needle).length - 1;

const splitWorld = (raw: string): { worldId: string | null; code: string } => {
  const separator = raw.indexOf(":");
  if (separator === -1) {
    return { worldId: null, code: raw };
  }

  const worldId = raw.slice(0, separator);
  const code = raw.slice(separator + 1);
  if (worldId.length === 0) {
    throw new LocationParseError(raw, "world id before ':' is empty");
  }
  if (code.includes(":")) {
    throw new LocationParseError(raw, "more than one ':' separator");
  }
  return { worldId, code };
};

const readParenthesized = (
  raw: string,
  segment: string,
  context: string,
): { readonly label: string; readonly value: string } => {
  const match = PARENTHESIZED.exec(segment);
  if (!match) {
    throw new LocationParseError(raw, `${context} must look like label(value)`);
  }
  return { label: match[1], value: match[2] };
};

export const parseLocation = (raw: string): Location => {
  if (raw.length === 0) {
    throw new LocationParseError(raw, "location is empty");
  }

  const { worldId, code } = splitWorld(raw);
  if (code.length === 0) {
    throw new LocationParseError(raw, "instance code is empty");
  }

  const tildes = countOccurrences(code, "~");

  if (tildes === 0) {
    return {
      raw,
      form: "bare",
      worldId,
      name: code,
      type: PUBLIC_INSTANCE_TYPE,
      userId: null,
      nonce: null,
    };
  }

  if (tildes === 1) {
    // Not yet confirmed against captured server traces.
    const [name, type] = code.split("~");
    if (name.length === 0 || type.length === 0) {
      throw new LocationParseError(raw, "name and type must both be present");
    }
    return { raw, form: "typed", worldId, name, type, userId: null, nonce: null };
  }

  if (tildes === 2) {
    const [name, owner, nonceSegment] = code.split("~");
    if (name.length === 0) {
      throw new LocationParseError(raw, "instance name is empty");
    }
    const { label: type, value: userId } = readParenthesized(raw, owner, "type segment");
    const { label, value: nonce } = readParenthesized(raw, nonceSegment, "nonce segment");
    if (label !== NONCE_PREFIX) {
      throw new LocationParseError(raw, `expected nonce segment, received ${label}`);
    }
    return { raw, form: "owned", worldId, name, type, userId, nonce };
  }

  throw new LocationParseError(raw, `unsupported number of '~' separators (${tildes})`);
};

export const formatLocation = (location: Location): string => {
  let code: string;
  switch (location.form) {
    case "bare":
      code = location.name;
      break;
    case "typed":
      code = `${location.name}~${location.type}`;
      break;
    case "owned":
      code = `${location.name}~${location.type}(${location.userId ?? ""})~${NONCE_PREFIX}(${location.nonce ?? ""})`;
      break;
  }
  return location.worldId === null ? code : `${location.worldId}:${code}`;
};

/** The instance part of a location, without its world prefix. */
export const instanceCodeOf = (location: Location): string =>
  formatLocation({ ...location, worldId: null });
