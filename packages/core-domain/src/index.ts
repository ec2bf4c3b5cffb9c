export * from "./value-objects/ids";

export * from "./entities/file-record";
export * from "./entities/tree-node";
export * from "./entities/change-set";
export * from "./entities/chunk";
export * from "./entities/embedding-record";
export * from "./entities/snapshot";
export * from "./entities/sync-session";
