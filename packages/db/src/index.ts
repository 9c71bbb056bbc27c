export * from "./client.ts";
export * from "./errors.ts";
export * from "./persistence.ts";
export * from "./queries/index.ts";
export * from "./session-store.ts";
export * from "./types.ts";
