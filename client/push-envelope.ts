import { ChannelError } from "./errors";
import { isObject } from "./payload-readers";

export const PRESENCE_EVENT_TYPES = [
  "friend-location",
  "friend-online",
  "friend-active",
  "friend-offline",
  "friend-add",
  "friend-delete",
  "friend-update",
  "notification",
] as const;

export type PresenceEventType = (typeof PRESENCE_EVENT_TYPES)[number];

export const isPresenceEventType = (value: string): value is PresenceEventType =>
  (PRESENCE_EVENT_TYPES as readonly string[]).includes(value);

export interface PushEnvelope {
  readonly type: string;
  readonly content: unknown;
}

/**
 * Decodes a text frame of the form `{ "type": string, "content": string }`
 * where `content` carries its own JSON document.
 */
export const decodePushFrame = (data: string): PushEnvelope => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data) as unknown;
  } catch (error) {
    throw new ChannelError("Push frame is not valid JSON.", { cause: error });
  }

  if (!isObject(parsed)) {
    throw new ChannelError("Push frame must be a JSON object.");
  }

  const { type, content } = parsed;
  if (typeof type !== "string" || type.length === 0) {
    throw new ChannelError("Push frame is missing its event type.");
  }
  if (typeof content !== "string") {
    throw new ChannelError(`Push frame ${type} content must be a JSON-encoded string.`);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(content) as unknown;
  } catch (error) {
    throw new ChannelError(`Push frame ${type} content is not valid JSON.`, { cause: error });
  }

  return { type, content: decoded };
};

export const encodePushFrame = (type: string, content: unknown): string =>
  JSON.stringify({ type, content: JSON.stringify(content) });
