import {
  isFavoriteType,
  isReleaseStatus,
  isUserState,
  isUserStatus,
  type FavoriteType,
  type ReleaseStatus,
  type UserState,
  type UserStatus,
} from "./api-types";
import { isLocation, formatLocation, type Location } from "./location";
import {
  isObject,
  readOptionalBoolean,
  readOptionalFiniteNumber,
  readOptionalString,
  readString,
  readStringArray,
} from "./payload-readers";
import { bind, type BoundRecord } from "./schema-binder";
import {
  AvatarShape,
  CurrentUserShape,
  FavoriteShape,
  InstanceShape,
  LimitedUserShape,
  LimitedWorldShape,
  NotificationShape,
  UserShape,
  WorldShape,
} from "./shapes";

export interface CurrentUserChanges {
  readonly email?: string;
  readonly status?: UserStatus;
  readonly statusDescription?: string;
  readonly bio?: string;
  readonly bioLinks?: readonly string[];
}

/**
 * The calls domain objects make on behalf of the caller. Implemented by the
 * REST client; objects only hold a non-owning reference to it.
 */
export interface ResourceClient {
  readonly fetchUserById: (userId: string) => Promise<User>;
  readonly fetchWorldById: (worldId: string) => Promise<World>;
  readonly fetchWorldInstance: (worldId: string, instanceId: string) => Promise<Instance>;
  readonly fetchAvatarsByAuthor: (userId: string) => Promise<readonly Avatar[]>;
  readonly fetchOwnAvatars: (releaseStatus: ReleaseStatus) => Promise<readonly Avatar[]>;
  readonly unfriend: (userId: string) => Promise<void>;
  readonly sendFriendRequest: (userId: string) => Promise<Notification>;
  readonly addFavorite: (type: FavoriteType, favoriteId: string, tags?: readonly string[]) => Promise<Favorite>;
  readonly fetchFavorites: (type: FavoriteType, n?: number) => Promise<readonly Favorite[]>;
  readonly fetchFavorite: (favoriteId: string) => Promise<Favorite>;
  readonly removeFavorite: (favoriteId: string) => Promise<void>;
  readonly selectAvatar: (avatarId: string) => Promise<void>;
  readonly joinInstance: (location: string) => Promise<void>;
  readonly updateCurrentUser: (userId: string, changes: CurrentUserChanges) => Promise<CurrentUser>;
}

export interface Fetchable<T> {
  readonly fetchFull: () => Promise<T>;
}

export interface Followable {
  readonly unfriend: () => Promise<void>;
}

export interface FriendRequestable {
  readonly sendFriendRequest: () => Promise<Notification>;
}

export interface Favoritable {
  readonly favorite: () => Promise<Favorite>;
}

const readLocation = (value: unknown): Location | null => (isLocation(value) ? value : null);

const readRecords = (value: unknown): readonly BoundRecord[] =>
  Array.isArray(value) ? value.filter(isObject) : [];

abstract class BoundObject {
  protected constructor(
    protected readonly client: ResourceClient,
    public readonly raw: BoundRecord,
  ) {}

  /** Any bound field, including ones the typed getters do not cover. */
  field(key: string): unknown {
    return this.raw[key];
  }

  protected requireString(key: string): string {
    return readString(this.raw[key], `${this.constructor.name}.${key}`);
  }
}

abstract class IdentifiedObject extends BoundObject {
  get id(): string {
    return this.requireString("id");
  }
}

export class UnityPackage extends IdentifiedObject {
  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get platform(): string | undefined {
    return readOptionalString(this.raw.platform);
  }

  get assetVersion(): number | undefined {
    return readOptionalFiniteNumber(this.raw.assetVersion);
  }

  get unityVersion(): string | undefined {
    return readOptionalString(this.raw.unityVersion);
  }
}

export class Feature extends BoundObject {
  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  isEnabled(name: string): boolean {
    return this.raw[name] === true;
  }
}

export class PastDisplayName extends BoundObject {
  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get displayName(): string {
    return this.requireString("displayName");
  }

  get updatedAt(): string {
    return this.requireString("updated_at");
  }
}

export class Avatar extends IdentifiedObject implements Favoritable {
  static fromPayload(client: ResourceClient, payload: unknown): Avatar {
    return new Avatar(client, bind(AvatarShape, payload));
  }

  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get name(): string {
    return this.requireString("name");
  }

  get authorId(): string {
    return this.requireString("authorId");
  }

  get authorName(): string {
    return this.requireString("authorName");
  }

  get version(): number | undefined {
    return readOptionalFiniteNumber(this.raw.version);
  }

  get releaseStatus(): ReleaseStatus | null {
    const value = this.raw.releaseStatus;
    return isReleaseStatus(value) ? value : null;
  }

  get unityPackages(): readonly UnityPackage[] {
    return readRecords(this.raw.unityPackages).map((record) => new UnityPackage(this.client, record));
  }

  fetchAuthor(): Promise<User> {
    return this.client.fetchUserById(this.authorId);
  }

  favorite(): Promise<Favorite> {
    return this.client.addFavorite("avatar", this.id, ["avatars1"]);
  }

  select(): Promise<void> {
    return this.client.selectAvatar(this.id);
  }
}

/** Profile fields shared by every kind of user payload. */
abstract class UserProfile extends IdentifiedObject {
  get displayName(): string {
    return readOptionalString(this.raw.displayName) ?? "";
  }

  get username(): string | undefined {
    return readOptionalString(this.raw.username);
  }

  get bio(): string {
    return readOptionalString(this.raw.bio) ?? "";
  }

  get state(): UserState | null {
    const value = this.raw.state;
    return isUserState(value) ? value : null;
  }

  get status(): UserStatus | null {
    const value = this.raw.status;
    return isUserStatus(value) ? value : null;
  }

  get statusDescription(): string {
    return readOptionalString(this.raw.statusDescription) ?? "";
  }

  get location(): Location | null {
    return readLocation(this.raw.location);
  }

  get instanceId(): Location | null {
    return readLocation(this.raw.instanceId);
  }

  get worldId(): string | null {
    return readOptionalString(this.raw.worldId) ?? this.location?.worldId ?? null;
  }

  get tags(): readonly string[] {
    return readStringArray(this.raw.tags);
  }

  get pastDisplayNames(): readonly PastDisplayName[] {
    return readRecords(this.raw.pastDisplayNames).map(
      (record) => new PastDisplayName(this.client, record),
    );
  }

  fetchPublicAvatars(): Promise<readonly Avatar[]> {
    return this.client.fetchAvatarsByAuthor(this.id);
  }
}

export class LimitedUser
  extends UserProfile
  implements Fetchable<User>, Followable, FriendRequestable, Favoritable
{
  static fromPayload(client: ResourceClient, payload: unknown): LimitedUser {
    return new LimitedUser(client, bind(LimitedUserShape, payload));
  }

  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get isFriend(): boolean {
    return readOptionalBoolean(this.raw.isFriend) ?? false;
  }

  fetchFull(): Promise<User> {
    return this.client.fetchUserById(this.id);
  }

  unfriend(): Promise<void> {
    return this.client.unfriend(this.id);
  }

  sendFriendRequest(): Promise<Notification> {
    return this.client.sendFriendRequest(this.id);
  }

  favorite(): Promise<Favorite> {
    return this.client.addFavorite("friend", this.id);
  }
}

export class User extends LimitedUser {
  static override fromPayload(client: ResourceClient, payload: unknown): User {
    return new User(client, bind(UserShape, payload));
  }

  get allowAvatarCopying(): boolean {
    return readOptionalBoolean(this.raw.allowAvatarCopying) ?? false;
  }
}

/**
 * The signed-in account. It cannot befriend or favorite itself, so it only
 * shares the profile fields with other users.
 */
export class CurrentUser extends UserProfile implements Fetchable<User> {
  static fromPayload(client: ResourceClient, payload: unknown): CurrentUser {
    return new CurrentUser(client, bind(CurrentUserShape, payload));
  }

  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get email(): string | undefined {
    return readOptionalString(this.raw.email);
  }

  get hasEmail(): boolean {
    return readOptionalBoolean(this.raw.hasEmail) ?? false;
  }

  get bioLinks(): readonly string[] {
    return readStringArray(this.raw.bioLinks);
  }

  get feature(): Feature | null {
    const value = this.raw.feature;
    return isObject(value) ? new Feature(this.client, value) : null;
  }

  /** Friend ids as listed on the account payload, in server order. */
  get friendIds(): readonly string[] {
    return readStringArray(this.raw.friends);
  }

  fetchFull(): Promise<User> {
    return this.client.fetchUserById(this.id);
  }

  async fetchAvatars(releaseStatus: ReleaseStatus = "all"): Promise<readonly Avatar[]> {
    const avatars = await this.client.fetchOwnAvatars(releaseStatus);
    return avatars.filter((avatar) => avatar.authorId === this.id);
  }

  updateInfo(changes: CurrentUserChanges): Promise<CurrentUser> {
    return this.client.updateCurrentUser(this.id, {
      email: changes.email ?? this.email,
      status: changes.status ?? this.status ?? undefined,
      statusDescription: changes.statusDescription ?? this.statusDescription,
      bio: changes.bio ?? this.bio,
      bioLinks: changes.bioLinks ?? this.bioLinks,
    });
  }

  fetchFavorites(type: FavoriteType, n = 100): Promise<readonly Favorite[]> {
    return this.client.fetchFavorites(type, n);
  }

  getFavorite(favoriteId: string): Promise<Favorite> {
    return this.client.fetchFavorite(favoriteId);
  }

  removeFavorite(favoriteId: string): Promise<void> {
    return this.client.removeFavorite(favoriteId);
  }
}

export class LimitedWorld extends IdentifiedObject implements Favoritable {
  static fromPayload(client: ResourceClient, payload: unknown): LimitedWorld {
    return new LimitedWorld(client, bind(LimitedWorldShape, payload));
  }

  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get name(): string {
    return readOptionalString(this.raw.name) ?? "";
  }

  get authorId(): string | undefined {
    return readOptionalString(this.raw.authorId);
  }

  get occupants(): number {
    return readOptionalFiniteNumber(this.raw.occupants) ?? 0;
  }

  get visits(): number {
    return readOptionalFiniteNumber(this.raw.visits) ?? 0;
  }

  get releaseStatus(): ReleaseStatus | null {
    const value = this.raw.releaseStatus;
    return isReleaseStatus(value) ? value : null;
  }

  get unityPackages(): readonly UnityPackage[] {
    return readRecords(this.raw.unityPackages).map((record) => new UnityPackage(this.client, record));
  }

  fetchAuthor(): Promise<User> {
    return this.client.fetchUserById(readString(this.raw.authorId, "World.authorId"));
  }

  favorite(): Promise<Favorite> {
    return this.client.addFavorite("world", this.id);
  }
}

export class World extends LimitedWorld implements Fetchable<World> {
  static override fromPayload(client: ResourceClient, payload: unknown): World {
    return new World(client, bind(WorldShape, payload));
  }

  get namespace(): string | undefined {
    return readOptionalString(this.raw.namespace);
  }

  /** `[instanceId, occupantCount]` pairs as reported by the server. */
  get instances(): readonly (readonly [string, number])[] {
    const value = this.raw.instances;
    if (!Array.isArray(value)) {
      return [];
    }
    const pairs: [string, number][] = [];
    for (const entry of value) {
      if (Array.isArray(entry) && typeof entry[0] === "string" && typeof entry[1] === "number") {
        pairs.push([entry[0], entry[1]]);
      }
    }
    return pairs;
  }

  fetchFull(): Promise<World> {
    return this.client.fetchWorldById(this.id);
  }

  fetchInstance(instanceId: string): Promise<Instance> {
    return this.client.fetchWorldInstance(this.id, instanceId);
  }
}

const SHORT_URL_BASE = "https://vrchat.com/i/";

export class Instance extends BoundObject {
  static fromPayload(client: ResourceClient, payload: unknown): Instance {
    return new Instance(client, bind(InstanceShape, payload));
  }

  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get id(): Location | null {
    return readLocation(this.raw.id);
  }

  get location(): Location | null {
    return readLocation(this.raw.location);
  }

  get instanceId(): Location | null {
    return readLocation(this.raw.instanceId);
  }

  get worldId(): string {
    return readOptionalString(this.raw.worldId) ?? this.location?.worldId ?? this.requireString("worldId");
  }

  get userCount(): number {
    return readOptionalFiniteNumber(this.raw.n_users) ?? 0;
  }

  get shortName(): string | null {
    return readOptionalString(this.raw.shortName) ?? null;
  }

  get shortUrl(): string | null {
    const shortName = this.shortName;
    return shortName ? `${SHORT_URL_BASE}${shortName}` : null;
  }

  fetchWorld(): Promise<World> {
    return this.client.fetchWorldById(this.worldId);
  }

  join(): Promise<void> {
    const location = this.location ?? this.id;
    if (!location) {
      return Promise.reject(new Error("Instance has no location to join."));
    }
    return this.client.joinInstance(formatLocation(location));
  }
}

export class NotificationDetails extends BoundObject {
  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get worldId(): Location | null {
    return readLocation(this.raw.worldId);
  }

  get worldName(): string | undefined {
    return readOptionalString(this.raw.worldName);
  }
}

export class Notification extends IdentifiedObject {
  static fromPayload(client: ResourceClient, payload: unknown): Notification {
    return new Notification(client, bind(NotificationShape, payload));
  }

  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get type(): string {
    return this.requireString("type");
  }

  get senderUserId(): string {
    return this.requireString("senderUserId");
  }

  get senderUsername(): string {
    return this.requireString("senderUsername");
  }

  get message(): string {
    return readOptionalString(this.raw.message) ?? "";
  }

  get createdAt(): string | undefined {
    return readOptionalString(this.raw.created_at);
  }

  get details(): NotificationDetails | null {
    const value = this.raw.details;
    return isObject(value) ? new NotificationDetails(this.client, value) : null;
  }

  fetchSender(): Promise<User> {
    return this.client.fetchUserById(this.senderUserId);
  }
}

export class Favorite extends IdentifiedObject {
  static fromPayload(client: ResourceClient, payload: unknown): Favorite {
    return new Favorite(client, bind(FavoriteShape, payload));
  }

  constructor(client: ResourceClient, record: BoundRecord) {
    super(client, record);
  }

  get type(): FavoriteType | null {
    const value = this.raw.type;
    return isFavoriteType(value) ? value : null;
  }

  get favoriteId(): string {
    return this.requireString("favoriteId");
  }

  get tags(): readonly string[] {
    return readStringArray(this.raw.tags);
  }

  remove(): Promise<void> {
    return this.client.removeFavorite(this.id);
  }
}
