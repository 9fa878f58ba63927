import type { Instance, Notification, User, World } from "./domain-objects";
import { UnknownHookError } from "./errors";
import type { Location } from "./location";

/** Hooks may be async; the channel waits for them before the next event. */
export type HookResult = void | Promise<void>;

export interface PresenceHooks {
  readonly connect: () => HookResult;
  readonly disconnect: (code: number, reason: string) => HookResult;
  readonly friendOnline: (friend: User) => HookResult;
  readonly friendActive: (friend: User) => HookResult;
  readonly friendOffline: (friend: User) => HookResult;
  /** World, location and instance are null when the friend is in a private instance. */
  readonly friendLocation: (
    friend: User,
    world: World | null,
    location: Location | null,
    instance: Instance | null,
  ) => HookResult;
  readonly friendAdd: (friend: User) => HookResult;
  readonly friendDelete: (friend: User | null) => HookResult;
  readonly friendUpdate: (friend: User, previous: User | null) => HookResult;
  readonly notification: (notification: Notification) => HookResult;
  readonly unhandledEvent: (type: string, content: unknown) => HookResult;
  readonly error: (error: Error) => HookResult;
}

export type PresenceHookName = keyof PresenceHooks;

export const PRESENCE_HOOK_NAMES: readonly PresenceHookName[] = [
  "connect",
  "disconnect",
  "friendOnline",
  "friendActive",
  "friendOffline",
  "friendLocation",
  "friendAdd",
  "friendDelete",
  "friendUpdate",
  "notification",
  "unhandledEvent",
  "error",
];

export const isPresenceHookName = (value: string): value is PresenceHookName =>
  (PRESENCE_HOOK_NAMES as readonly string[]).includes(value);

const noop = (): void => {};

export const createDefaultHooks = (): PresenceHooks => ({
  connect: noop,
  disconnect: noop,
  friendOnline: noop,
  friendActive: noop,
  friendOffline: noop,
  friendLocation: noop,
  friendAdd: noop,
  friendDelete: noop,
  friendUpdate: noop,
  notification: noop,
  unhandledEvent: noop,
  error: noop,
});

/**
 * Hook table keyed by event kind. Overrides are checked against the fixed
 * set of names, so a misspelled hook fails loudly instead of never firing.
 */
export class PresenceHookTable {
  private hooks: PresenceHooks = createDefaultHooks();

  get current(): PresenceHooks {
    return this.hooks;
  }

  set<K extends PresenceHookName>(name: K, handler: PresenceHooks[K]): void {
    if (!isPresenceHookName(name)) {
      throw new UnknownHookError(name);
    }
    if (typeof handler !== "function") {
      throw new TypeError(`Presence hook "${name}" must be a function.`);
    }
    this.hooks = { ...this.hooks, [name]: handler };
  }

  /** Registers several hooks at once; nothing is applied if any entry is invalid. */
  register(overrides: Partial<PresenceHooks>): void {
    for (const [name, handler] of Object.entries(overrides)) {
      if (!isPresenceHookName(name)) {
        throw new UnknownHookError(name);
      }
      if (typeof handler !== "function") {
        throw new TypeError(`Presence hook "${name}" must be a function.`);
      }
    }
    this.hooks = { ...this.hooks, ...overrides };
  }

  reset(name?: PresenceHookName): void {
    const defaults = createDefaultHooks();
    this.hooks = name ? { ...this.hooks, [name]: defaults[name] } : defaults;
  }
}
