import { defineShape, extendShape, parserBinder, shapeBinder, type Shape } from "./schema-binder";
import { parseLocation } from "./location";

const readLocationField = (value: unknown, context: string) => {
  if (value === null || value === "") {
    return null;
  }
  if (typeof value !== "string") {
    throw new Error(`${context} must be a location string.`);
  }
  return parseLocation(value);
};

const locationField = parserBinder(readLocationField);

// Every domain object keeps a back-reference to its client under this name.
const RESERVED_KEYS = ["client"] as const;

export const UnityPackageShape: Shape = defineShape({
  objectType: "UnityPackage",
  mode: "unique",
  fields: ["id", "platform", "assetVersion", "unitySortNumber"],
  forbidden: RESERVED_KEYS,
});

export const AvatarShape: Shape = defineShape({
  objectType: "Avatar",
  mode: "unique",
  fields: ["id", "authorId", "authorName", "version", "name"],
  arrays: { unityPackages: shapeBinder(UnityPackageShape) },
  forbidden: RESERVED_KEYS,
});

export const FeatureShape: Shape = defineShape({
  objectType: "Feature",
  mode: "unique",
  fields: [],
  forbidden: RESERVED_KEYS,
});

export const PastDisplayNameShape: Shape = defineShape({
  objectType: "PastDisplayName",
  mode: "only",
  fields: ["displayName", "updated_at"],
  forbidden: RESERVED_KEYS,
});

export const LimitedUserShape: Shape = defineShape({
  objectType: "LimitedUser",
  mode: "unique",
  fields: ["id", "isFriend"],
  nested: {
    location: locationField,
    instanceId: locationField,
  },
  arrays: { pastDisplayNames: shapeBinder(PastDisplayNameShape) },
  forbidden: RESERVED_KEYS,
});

export const UserShape: Shape = extendShape(LimitedUserShape, {
  objectType: "User",
  fields: ["allowAvatarCopying"],
});

export const CurrentUserShape: Shape = extendShape(UserShape, {
  objectType: "CurrentUser",
  fields: ["feature", "hasEmail"],
  nested: { feature: shapeBinder(FeatureShape) },
});

export const LimitedWorldShape: Shape = defineShape({
  objectType: "LimitedWorld",
  mode: "unique",
  fields: ["id", "visits", "occupants", "labsPublicationDate"],
  arrays: { unityPackages: shapeBinder(UnityPackageShape) },
  forbidden: RESERVED_KEYS,
});

export const WorldShape: Shape = extendShape(LimitedWorldShape, {
  objectType: "World",
  fields: ["namespace", "previewYoutubeId", "instances"],
});

export const InstanceShape: Shape = defineShape({
  objectType: "Instance",
  mode: "unique",
  fields: ["n_users", "instanceId", "shortName"],
  nested: {
    id: locationField,
    location: locationField,
    instanceId: locationField,
  },
  forbidden: RESERVED_KEYS,
});

export const NotificationDetailsShape: Shape = defineShape({
  objectType: "NotificationDetails",
  mode: "unique",
  fields: [],
  nested: { worldId: locationField },
  forbidden: RESERVED_KEYS,
});

export const NotificationShape: Shape = defineShape({
  objectType: "Notification",
  mode: "unique",
  fields: ["id", "type", "senderUsername", "senderUserId"],
  encoded: ["details"],
  nested: { details: shapeBinder(NotificationDetailsShape) },
  forbidden: RESERVED_KEYS,
});

export const FavoriteShape: Shape = defineShape({
  objectType: "Favorite",
  mode: "unique",
  fields: ["id", "type", "favoriteId", "tags"],
  forbidden: RESERVED_KEYS,
});
