import { readFiniteNumber, readString } from "./payload-readers";

export const DEFAULT_API_BASE_URL = "https://api.vrchat.cloud/api/1";
export const DEFAULT_PIPELINE_URL = "wss://pipeline.vrchat.cloud/";
export const DEFAULT_RECONNECT_DELAY_MS = 2000;
export const DEFAULT_FRIENDS_PAGE_SIZE = 100;
export const DEFAULT_USER_AGENT = "vrc-presence";

const MAX_FRIENDS_PAGE_SIZE = 100;

export interface ClientConfiguration {
  readonly apiBaseUrl: string;
  readonly pipelineUrl: string;
  /** Value of the `auth` session cookie; also used as the push channel token. */
  readonly authToken: string;
  readonly apiKey: string | null;
  readonly userAgent: string;
  readonly reconnect: boolean;
  readonly reconnectDelayMs: number;
  readonly friendsPageSize: number;
}

export type ClientConfigurationInput = Partial<ClientConfiguration> & {
  readonly authToken: string;
};

const readDelay = (value: unknown, context: string): number => {
  const delay = readFiniteNumber(value, context);
  if (delay < 0) {
    throw new Error(`${context} must not be negative.`);
  }
  return delay;
};

const readPageSize = (value: unknown, context: string): number => {
  const size = readFiniteNumber(value, context);
  if (!Number.isInteger(size) || size < 1 || size > MAX_FRIENDS_PAGE_SIZE) {
    throw new Error(`${context} must be an integer between 1 and ${MAX_FRIENDS_PAGE_SIZE}.`);
  }
  return size;
};

export const resolveConfiguration = (input: ClientConfigurationInput): ClientConfiguration => ({
  apiBaseUrl: readString(input.apiBaseUrl ?? DEFAULT_API_BASE_URL, "configuration.apiBaseUrl").replace(/\/+$/, ""),
  pipelineUrl: readString(input.pipelineUrl ?? DEFAULT_PIPELINE_URL, "configuration.pipelineUrl"),
  authToken: readString(input.authToken, "configuration.authToken"),
  apiKey: input.apiKey ? input.apiKey : null,
  userAgent: readString(input.userAgent ?? DEFAULT_USER_AGENT, "configuration.userAgent"),
  reconnect: input.reconnect ?? true,
  reconnectDelayMs: readDelay(input.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS, "configuration.reconnectDelayMs"),
  friendsPageSize: readPageSize(input.friendsPageSize ?? DEFAULT_FRIENDS_PAGE_SIZE, "configuration.friendsPageSize"),
});

const readFlag = (value: string | undefined): boolean | undefined => {
  if (value === undefined || value.length === 0) {
    return undefined;
  }
  return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
};

const readNumber = (value: string | undefined): number | undefined =>
  value === undefined || value.length === 0 ? undefined : Number(value);

export const readConfigurationFromEnv = (
  env: Readonly<Record<string, string | undefined>>,
): ClientConfiguration =>
  resolveConfiguration({
    apiBaseUrl: env.VRC_API_URL || undefined,
    pipelineUrl: env.VRC_PIPELINE_URL || undefined,
    authToken: env.VRC_AUTH_TOKEN ?? "",
    apiKey: env.VRC_API_KEY || null,
    userAgent: env.VRC_USER_AGENT || undefined,
    reconnect: readFlag(env.VRC_RECONNECT),
    reconnectDelayMs: readNumber(env.VRC_RECONNECT_DELAY_MS),
  });
