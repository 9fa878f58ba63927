export const createUserPayload = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id: "usr_a",
  displayName: "Alpha",
  username: "alpha",
  bio: "",
  isFriend: true,
  allowAvatarCopying: false,
  state: "online",
  status: "active",
  location: "wrld_home:10001",
  tags: ["system_trust_basic"],
  ...overrides,
});

export const createCurrentUserPayload = (overrides: Record<string, unknown> = {}): Record<string, unknown> =>
  createUserPayload({
    id: "usr_me",
    displayName: "Me",
    isFriend: false,
    hasEmail: true,
    feature: { twoFactorAuth: true },
    friends: ["usr_a", "usr_b"],
    location: "",
    ...overrides,
  });

export const createUnityPackagePayload = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id: "unp_1",
  platform: "standalonewindows",
  assetVersion: 4,
  unitySortNumber: 20190432000,
  ...overrides,
});

export const createWorldPayload = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id: "wrld_home",
  name: "Home World",
  authorId: "usr_author",
  visits: 120,
  occupants: 3,
  labsPublicationDate: "none",
  namespace: "",
  previewYoutubeId: null,
  instances: [["10001", 2]],
  unityPackages: [createUnityPackagePayload()],
  ...overrides,
});

export const createInstancePayload = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id: "wrld_home:10001",
  location: "wrld_home:10001",
  instanceId: "10001",
  worldId: "wrld_home",
  shortName: "abcd1234",
  n_users: 2,
  ...overrides,
});

export const createNotificationPayload = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id: "not_1",
  type: "invite",
  senderUserId: "usr_a",
  senderUsername: "alpha",
  message: "join me",
  details: JSON.stringify({ worldId: "wrld_home:10001", worldName: "Home World" }),
  ...overrides,
});
