export * from "./observability/index.ts";
export * from "./intake/intake-engine.ts";
export * from "./intake/validators.ts";
export * from "./admin/admin-queries.ts";
export * from "./admin/admin-report.ts";
export * from "./admin/admin-flow.ts";
export * from "./conversation/conversation-router.ts";
