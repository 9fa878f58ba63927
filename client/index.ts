export * from "./api-types";
export * from "./configuration";
export * from "./domain-objects";
export * from "./errors";
export * from "./location";
export * from "./logger";
export * from "./payload-readers";
export * from "./presence-channel";
export * from "./presence-client";
export * from "./presence-hooks";
export * from "./push-envelope";
export * from "./push-socket";
export * from "./rest-client";
export * from "./rest-transport";
export * from "./roster";
export * from "./schema-binder";
export * from "./shapes";
