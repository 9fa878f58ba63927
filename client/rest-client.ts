import type { FavoriteType, ReleaseStatus } from "./api-types";
import type { ClientConfiguration } from "./configuration";
import {
  Avatar,
  CurrentUser,
  Favorite,
  Instance,
  LimitedUser,
  Notification,
  User,
  World,
  type CurrentUserChanges,
  type ResourceClient,
} from "./domain-objects";
import { mapArray } from "./payload-readers";
import type { HttpMethod, QueryParams, RestTransport } from "./rest-transport";

export interface FriendListOptions {
  /** List offline friends instead of online ones. */
  readonly offline?: boolean;
  /** Maximum number of friends to return; 0 means all of them. */
  readonly n?: number;
  readonly offset?: number;
}

export interface AvatarQuery {
  readonly user?: "me" | "friends";
  readonly featured?: boolean;
  readonly tag?: readonly string[];
  readonly userId?: string;
  readonly n?: number;
  readonly offset?: number;
  readonly order?: "ascending" | "descending";
  readonly releaseStatus?: ReleaseStatus;
  readonly sort?: "created" | "updated" | "order" | "_created_at" | "_updated_at";
  readonly maxUnityVersion?: string;
  readonly minUnityVersion?: string;
  readonly maxAssetVersion?: string;
  readonly minAssetVersion?: string;
  readonly platform?: string;
}

const segment = (value: string): string => encodeURIComponent(value);

export class RestClient implements ResourceClient {
  constructor(
    private readonly transport: RestTransport,
    private readonly configuration: Pick<ClientConfiguration, "friendsPageSize">,
  ) {}

  async fetchMe(): Promise<CurrentUser> {
    return CurrentUser.fromPayload(this, await this.call("/auth/user"));
  }

  async fetchUserById(userId: string): Promise<User> {
    return User.fromPayload(this, await this.call(`/users/${segment(userId)}`));
  }

  async fetchUserByName(name: string): Promise<User> {
    return User.fromPayload(this, await this.call(`/users/${segment(name)}/name`));
  }

  /** Pages through the friend list until a short page or `n` entries. */
  async fetchFriends(options: FriendListOptions = {}): Promise<readonly LimitedUser[]> {
    const pageSize = this.configuration.friendsPageSize;
    const limit = options.n ?? 0;
    let offset = options.offset ?? 0;
    const friends: LimitedUser[] = [];

    for (;;) {
      const remaining = limit > 0 ? limit - friends.length : pageSize;
      const n = Math.min(pageSize, remaining);
      if (n <= 0) {
        break;
      }

      const body = await this.call("/auth/user/friends", "GET", {
        offset,
        offline: options.offline ?? false,
        n,
      });
      const page = mapArray(body, "friends", (entry) => LimitedUser.fromPayload(this, entry));
      friends.push(...page);

      if (page.length < n) {
        break;
      }
      offset += n;
    }

    return friends;
  }

  /** Resolves every listed friend to a full user, one request per friend. */
  async fetchFullFriends(options: FriendListOptions = {}): Promise<readonly User[]> {
    const friends = await this.fetchFriends(options);
    const users: User[] = [];
    for (const friend of friends) {
      users.push(await friend.fetchFull());
    }
    return users;
  }

  async fetchAvatar(avatarId: string): Promise<Avatar> {
    return Avatar.fromPayload(this, await this.call(`/avatars/${segment(avatarId)}`));
  }

  async listAvatars(query: AvatarQuery = {}): Promise<readonly Avatar[]> {
    const params: Record<string, QueryParams[string]> = {};
    for (const [key, value] of Object.entries(query)) {
      // Unset and falsy filters are left off the query.
      if (value) {
        params[key] = value;
      }
    }
    return this.readAvatars(await this.call("/avatars", "GET", params));
  }

  async fetchAvatarsByAuthor(userId: string): Promise<readonly Avatar[]> {
    return this.readAvatars(await this.call("/avatars", "GET", { userId }));
  }

  async fetchOwnAvatars(releaseStatus: ReleaseStatus): Promise<readonly Avatar[]> {
    return this.readAvatars(await this.call("/avatars", "GET", { releaseStatus, user: "me" }));
  }

  async selectAvatar(avatarId: string): Promise<void> {
    await this.call(`/avatars/${segment(avatarId)}/select`, "PUT");
  }

  async fetchWorldById(worldId: string): Promise<World> {
    return World.fromPayload(this, await this.call(`/worlds/${segment(worldId)}`));
  }

  async fetchWorldInstance(worldId: string, instanceId: string): Promise<Instance> {
    return Instance.fromPayload(
      this,
      await this.call(`/instances/${segment(worldId)}:${segment(instanceId)}`),
    );
  }

  async joinInstance(location: string): Promise<void> {
    await this.call("/joins", "PUT", {}, { worldId: location });
  }

  async fetchNotifications(): Promise<readonly Notification[]> {
    const body = await this.call("/auth/user/notifications");
    return mapArray(body, "notifications", (entry) => Notification.fromPayload(this, entry));
  }

  async unfriend(userId: string): Promise<void> {
    await this.call(`/auth/user/friends/${segment(userId)}`, "DELETE");
  }

  async sendFriendRequest(userId: string): Promise<Notification> {
    return Notification.fromPayload(this, await this.call(`/user/${segment(userId)}/friendRequest`, "POST"));
  }

  async addFavorite(
    type: FavoriteType,
    favoriteId: string,
    tags?: readonly string[],
  ): Promise<Favorite> {
    const body = await this.call("/favorites", "POST", {}, { type, favoriteId, tags });
    return Favorite.fromPayload(this, body);
  }

  async fetchFavorites(type: FavoriteType, n = 100): Promise<readonly Favorite[]> {
    const body = await this.call("/favorites", "GET", { type, n });
    return mapArray(body, "favorites", (entry) => Favorite.fromPayload(this, entry));
  }

  async fetchFavorite(favoriteId: string): Promise<Favorite> {
    return Favorite.fromPayload(this, await this.call(`/favorites/${segment(favoriteId)}`));
  }

  async removeFavorite(favoriteId: string): Promise<void> {
    await this.call(`/favorites/${segment(favoriteId)}`, "DELETE");
  }

  async updateCurrentUser(userId: string, changes: CurrentUserChanges): Promise<CurrentUser> {
    return CurrentUser.fromPayload(this, await this.call(`/users/${segment(userId)}`, "PUT", {}, changes));
  }

  private async call(
    path: string,
    method: HttpMethod = "GET",
    params: QueryParams = {},
    body?: unknown,
  ): Promise<unknown> {
    const response = await this.transport.request(path, method, params, body);
    return response.body;
  }

  private readAvatars(body: unknown): readonly Avatar[] {
    return mapArray(body, "avatars", (entry) => Avatar.fromPayload(this, entry));
  }
}
