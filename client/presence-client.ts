import {
  resolveConfiguration,
  type ClientConfiguration,
  type ClientConfigurationInput,
} from "./configuration";
import type { CurrentUser, User } from "./domain-objects";
import { createConsoleLogger, type Logger } from "./logger";
import { PresenceChannel } from "./presence-channel";
import type { PresenceHooks } from "./presence-hooks";
import type { PushSocketFactory } from "./push-socket";
import { RestClient } from "./rest-client";
import { FetchRestTransport, type RestTransport } from "./rest-transport";
import { RosterReconciler, type RosterSnapshot } from "./roster";

export interface PresenceClientDependencies {
  readonly transport?: RestTransport;
  readonly socketFactory?: PushSocketFactory;
  readonly logger?: Logger;
}

/**
 * Signed-in session: REST access plus a push channel whose roster starts
 * from the friend lists fetched at startup.
 */
export class PresenceClient {
  public readonly configuration: ClientConfiguration;
  public readonly rest: RestClient;
  public readonly channel: PresenceChannel;
  private readonly roster = new RosterReconciler();
  private readonly logger: Logger;
  private currentUser: CurrentUser | null = null;

  constructor(configuration: ClientConfigurationInput, dependencies: PresenceClientDependencies = {}) {
    this.configuration = resolveConfiguration(configuration);
    this.logger = dependencies.logger ?? createConsoleLogger("presence-client");
    this.rest = new RestClient(
      dependencies.transport ?? new FetchRestTransport(this.configuration),
      this.configuration,
    );
    this.channel = new PresenceChannel(this.configuration, {
      resources: this.rest,
      roster: this.roster,
      socketFactory: dependencies.socketFactory,
      logger: dependencies.logger,
    });
  }

  get me(): CurrentUser | null {
    return this.currentUser;
  }

  on(hooks: Partial<PresenceHooks>): this {
    this.channel.on(hooks);
    return this;
  }

  friends(): readonly User[] {
    return this.channel.friends();
  }

  rosterSnapshot(): RosterSnapshot {
    return this.channel.rosterSnapshot();
  }

  /** Loads the account and its friends, then opens the push channel. */
  async start(): Promise<CurrentUser> {
    const me = await this.rest.fetchMe();
    this.currentUser = me;

    const online = await this.rest.fetchFullFriends({ offline: false });
    const offline = await this.rest.fetchFullFriends({ offline: true });
    this.roster.seed([...offline, ...online]);
    this.logger.info(`seeded roster with ${online.length} online and ${offline.length} offline friends`);

    this.channel.connect();
    return me;
  }

  async refreshMe(): Promise<CurrentUser> {
    this.currentUser = await this.rest.fetchMe();
    return this.currentUser;
  }

  stop(): void {
    this.channel.disconnect();
  }
}
