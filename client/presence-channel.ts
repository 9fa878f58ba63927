import type { ClientConfiguration } from "./configuration";
import { Notification, User, World, type Instance, type ResourceClient } from "./domain-objects";
import { ChannelAlreadyOpenError, ChannelError, toError } from "./errors";
import { instanceCodeOf, parseLocation, type Location } from "./location";
import { createConsoleLogger, type Logger } from "./logger";
import { isObject, readString } from "./payload-readers";
import {
  PresenceHookTable,
  type HookResult,
  type PresenceHookName,
  type PresenceHooks,
} from "./presence-hooks";
import {
  decodePushFrame,
  isPresenceEventType,
  type PresenceEventType,
  type PushEnvelope,
} from "./push-envelope";
import { createWebSocketFactory, type PushSocket, type PushSocketFactory } from "./push-socket";
import { RosterReconciler, type RosterSnapshot } from "./roster";
import { tryBind } from "./schema-binder";
import { WorldShape } from "./shapes";

export type ChannelState = "disconnected" | "connecting" | "connected";

export type PresenceChannelConfiguration = Pick<
  ClientConfiguration,
  "pipelineUrl" | "authToken" | "reconnect" | "reconnectDelayMs" | "userAgent"
>;

export interface PresenceChannelDependencies {
  readonly resources: ResourceClient;
  readonly roster?: RosterReconciler;
  readonly socketFactory?: PushSocketFactory;
  readonly logger?: Logger;
}

type EventHandler = (content: unknown) => Promise<void>;

const PRIVATE_LOCATION = "private";

const readContent = (content: unknown, type: string): Record<string, unknown> => {
  if (!isObject(content)) {
    throw new ChannelError(`${type} content must be an object.`);
  }
  return content;
};

/**
 * Owns a single push channel connection and keeps the friend roster in step
 * with the events it delivers.
 *
 * Socket callbacks run one at a time in arrival order: each message, with any
 * lookups it awaits, finishes before the next callback starts. Hooks run
 * inline and async hooks are awaited, so a slow hook holds up the channel.
 */
export class PresenceChannel {
  private readonly resources: ResourceClient;
  private readonly roster: RosterReconciler;
  private readonly socketFactory: PushSocketFactory;
  private readonly logger: Logger;
  private readonly hookTable = new PresenceHookTable();
  private readonly eventHandlers: Record<PresenceEventType, EventHandler>;
  private socket: PushSocket | null = null;
  private channelState: ChannelState = "disconnected";
  private reconnectEnabled: boolean;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectCount = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    public readonly configuration: PresenceChannelConfiguration,
    dependencies: PresenceChannelDependencies,
  ) {
    this.resources = dependencies.resources;
    this.roster = dependencies.roster ?? new RosterReconciler();
    this.socketFactory = dependencies.socketFactory ?? createWebSocketFactory(configuration.userAgent);
    this.logger = dependencies.logger ?? createConsoleLogger("presence-channel");
    this.reconnectEnabled = configuration.reconnect;
    this.eventHandlers = {
      "friend-location": (content) => this.handleFriendLocation(content),
      "friend-online": (content) => this.handleFriendPresence(content, "friend-online", "friendOnline"),
      "friend-active": (content) => this.handleFriendPresence(content, "friend-active", "friendActive"),
      "friend-offline": (content) => this.handleFriendOffline(content),
      "friend-add": (content) => this.handleFriendPresence(content, "friend-add", "friendAdd"),
      "friend-delete": (content) => this.handleFriendDelete(content),
      "friend-update": (content) => this.handleFriendUpdate(content),
      notification: (content) => this.handleNotification(content),
    };
  }

  get state(): ChannelState {
    return this.channelState;
  }

  get reconnectAttempts(): number {
    return this.reconnectCount;
  }

  get reconnects(): boolean {
    return this.reconnectEnabled;
  }

  get hooks(): PresenceHooks {
    return this.hookTable.current;
  }

  on(overrides: Partial<PresenceHooks>): this {
    this.hookTable.register(overrides);
    return this;
  }

  setHook<K extends PresenceHookName>(name: K, handler: PresenceHooks[K]): this {
    this.hookTable.set(name, handler);
    return this;
  }

  /** Copy of the roster; the live partitions never leave the channel. */
  rosterSnapshot(): RosterSnapshot {
    return this.roster.snapshot();
  }

  friends(): readonly User[] {
    return this.roster.friends();
  }

  /** Resolves once every callback received so far has been processed. */
  whenIdle(): Promise<void> {
    return this.queue;
  }

  /**
   * Opens the push channel. Throws `ChannelAlreadyOpenError` while a
   * connection is open or being established.
   */
  connect(): void {
    if (this.socket) {
      throw new ChannelAlreadyOpenError();
    }
    this.reconnectEnabled = this.configuration.reconnect;
    this.clearReconnectTimer();
    this.open();
  }

  /** Stops reconnecting and closes the current connection, if any. */
  disconnect(): void {
    this.reconnectEnabled = false;
    this.clearReconnectTimer();

    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.logger.info("closing push channel");
    socket.close();
  }

  private open(): void {
    const url = this.createChannelUrl();
    this.channelState = "connecting";
    this.logger.debug(`connecting to ${this.configuration.pipelineUrl}`);

    let socket: PushSocket | null = null;
    const isCurrent = (): boolean => socket !== null && socket === this.socket;

    try {
      socket = this.socketFactory(url, {
        onOpen: () => {
          this.enqueue(async () => {
            if (isCurrent()) {
              await this.handleOpen();
            }
          });
        },
        onMessage: (data) => {
          this.enqueue(async () => {
            if (isCurrent()) {
              await this.handleMessage(data);
            }
          });
        },
        onError: (error) => {
          this.enqueue(() => {
            if (isCurrent()) {
              this.reportError(new ChannelError(`Push channel error: ${error.message}`, { cause: error }));
            }
          });
        },
        onClose: (code, reason) => {
          this.enqueue(async () => {
            if (isCurrent()) {
              await this.handleClose(code, reason);
            }
          });
        },
      });
    } catch (error) {
      this.channelState = "disconnected";
      throw error;
    }

    this.socket = socket;
  }

  private createChannelUrl(): string {
    const url = new URL(this.configuration.pipelineUrl);
    url.searchParams.set("authToken", this.configuration.authToken);
    return url.toString();
  }

  private enqueue(task: () => Promise<void> | void): void {
    this.queue = this.queue.then(task).catch((error: unknown) => {
      this.reportError(error);
    });
  }

  private async handleOpen(): Promise<void> {
    this.channelState = "connected";
    this.logger.info("push channel connected");
    await this.invokeHook("connect", (hooks) => hooks.connect());
  }

  private async handleClose(code: number, reason: string): Promise<void> {
    this.socket = null;
    this.channelState = "disconnected";
    this.logger.info(`push channel closed (code ${code}${reason ? `, reason ${reason}` : ""})`);
    await this.invokeHook("disconnect", (hooks) => hooks.disconnect(code, reason));

    if (this.reconnectEnabled) {
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    this.clearReconnectTimer();
    const delay = this.configuration.reconnectDelayMs;
    this.logger.info(`reconnecting in ${delay}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      // Checked in the same turn as the reconnect itself.
      if (!this.reconnectEnabled || this.socket) {
        return;
      }
      this.reconnectCount += 1;
      try {
        this.open();
      } catch (error) {
        this.reportError(new ChannelError("Push channel reconnect failed.", { cause: error }));
      }
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private async handleMessage(data: string): Promise<void> {
    let envelope: PushEnvelope;
    try {
      envelope = decodePushFrame(data);
    } catch (error) {
      this.reportError(error);
      return;
    }

    const { type, content } = envelope;

    if (!isPresenceEventType(type)) {
      this.logger.debug(`unhandled push event ${type}`);
      await this.invokeHook("unhandledEvent", (hooks) => hooks.unhandledEvent(type, content));
      return;
    }

    try {
      await this.eventHandlers[type](content);
    } catch (error) {
      this.logger.error(`failed to process ${type} event`, error);
      this.reportError(error);
    }
  }

  private async handleFriendPresence(
    content: unknown,
    type: PresenceEventType,
    hook: "friendOnline" | "friendActive" | "friendAdd",
  ): Promise<void> {
    const payload = readContent(content, type);
    const friend = User.fromPayload(this.resources, payload.user);
    this.roster.upsert(friend);
    await this.invokeHook(hook, (hooks) => hooks[hook](friend));
  }

  private async handleFriendUpdate(content: unknown): Promise<void> {
    const payload = readContent(content, "friend-update");
    const friend = User.fromPayload(this.resources, payload.user);
    const previous = this.roster.upsert(friend);
    await this.invokeHook("friendUpdate", (hooks) => hooks.friendUpdate(friend, previous));
  }

  private async handleFriendOffline(content: unknown): Promise<void> {
    const payload = readContent(content, "friend-offline");
    const userId = readString(payload.userId, "friend-offline.userId");
    const friend = await this.resources.fetchUserById(userId);
    this.roster.upsert(friend);
    await this.invokeHook("friendOffline", (hooks) => hooks.friendOffline(friend));
  }

  private async handleFriendDelete(content: unknown): Promise<void> {
    const payload = readContent(content, "friend-delete");
    const userId = readString(payload.userId, "friend-delete.userId");
    const removed = this.roster.remove(userId);
    await this.invokeHook("friendDelete", (hooks) => hooks.friendDelete(removed));
  }

  private async handleFriendLocation(content: unknown): Promise<void> {
    const payload = readContent(content, "friend-location");
    const friend = User.fromPayload(this.resources, payload.user);

    if (payload.location === PRIVATE_LOCATION) {
      this.roster.upsert(friend);
      await this.invokeHook("friendLocation", (hooks) => hooks.friendLocation(friend, null, null, null));
      return;
    }

    const location = parseLocation(readString(payload.location, "friend-location.location"));
    const world = await this.resolveWorld(payload, location);
    const instance = await this.resolveInstance(payload, world, location);

    this.roster.upsert(friend);
    await this.invokeHook("friendLocation", (hooks) => hooks.friendLocation(friend, world, location, instance));
  }

  /** Binds the embedded world, fetching it by id when the payload is incomplete. */
  private async resolveWorld(payload: Record<string, unknown>, location: Location): Promise<World> {
    const bound = tryBind(WorldShape, payload.world);
    if (bound.ok) {
      return new World(this.resources, bound.value);
    }

    const worldId = this.readWorldId(payload, location);
    if (!worldId) {
      throw bound.error;
    }
    this.logger.debug(`embedded world incomplete (${bound.error.message}); fetching ${worldId}`);
    return this.resources.fetchWorldById(worldId);
  }

  private readWorldId(payload: Record<string, unknown>, location: Location): string | null {
    const world = payload.world;
    if (isObject(world) && typeof world.id === "string" && world.id.length > 0) {
      return world.id;
    }
    if (typeof payload.worldId === "string" && payload.worldId.length > 0) {
      return payload.worldId;
    }
    return location.worldId;
  }

  private resolveInstance(
    payload: Record<string, unknown>,
    world: World,
    location: Location,
  ): Promise<Instance> {
    const instanceId =
      typeof payload.instance === "string" && payload.instance.length > 0
        ? payload.instance
        : instanceCodeOf(location);
    return world.fetchInstance(instanceId);
  }

  private async handleNotification(content: unknown): Promise<void> {
    const notification = Notification.fromPayload(this.resources, content);
    await this.invokeHook("notification", (hooks) => hooks.notification(notification));
  }

  /** Runs a hook to completion; a throw or a rejection goes to the error hook. */
  private async invokeHook(name: PresenceHookName, call: (hooks: PresenceHooks) => HookResult): Promise<void> {
    try {
      await call(this.hookTable.current);
    } catch (error) {
      this.logger.warn(`${name} hook failed`);
      this.reportError(error);
    }
  }

  private reportError(error: unknown): void {
    const cause = toError(error);
    const logFailure = (hookError: unknown): void => {
      this.logger.error("error hook failed", hookError, cause);
    };
    try {
      const result = this.hookTable.current.error(cause);
      if (result instanceof Promise) {
        result.catch(logFailure);
      }
    } catch (hookError) {
      logFailure(hookError);
    }
  }
}
