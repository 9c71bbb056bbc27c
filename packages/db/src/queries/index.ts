export * from "./applications.ts";
export * from "./intake-sessions.ts";
export * from "./user-languages.ts";
