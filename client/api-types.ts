const createGuard =
  <T extends string>(values: readonly T[]) =>
  (value: unknown): value is T =>
    typeof value === "string" && (values as readonly string[]).includes(value);

export const USER_STATES = ["online", "active", "offline"] as const;
export type UserState = (typeof USER_STATES)[number];
export const isUserState = createGuard(USER_STATES);

export const USER_STATUSES = ["active", "join me", "ask me", "busy", "offline"] as const;
export type UserStatus = (typeof USER_STATUSES)[number];
export const isUserStatus = createGuard(USER_STATUSES);

export const RELEASE_STATUSES = ["public", "private", "hidden", "all"] as const;
export type ReleaseStatus = (typeof RELEASE_STATUSES)[number];
export const isReleaseStatus = createGuard(RELEASE_STATUSES);

export const DEVELOPER_TYPES = ["none", "trusted", "internal", "moderator"] as const;
export type DeveloperType = (typeof DEVELOPER_TYPES)[number];
export const isDeveloperType = createGuard(DEVELOPER_TYPES);

export const INSTANCE_TYPES = ["hidden", "friends", ""] as const;
export type InstanceType = (typeof INSTANCE_TYPES)[number];
export const isInstanceType = createGuard(INSTANCE_TYPES);

export const NOTIFICATION_TYPES = ["friendRequest", "invite", "requestInvite"] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];
export const isNotificationType = createGuard(NOTIFICATION_TYPES);

export const FAVORITE_TYPES = ["world", "friend", "avatar"] as const;
export type FavoriteType = (typeof FAVORITE_TYPES)[number];
export const isFavoriteType = createGuard(FAVORITE_TYPES);

export const REGIONS = ["us", "eu", "jp"] as const;
export type Region = (typeof REGIONS)[number];
export const isRegion = createGuard(REGIONS);
