export * from "./bot.ts";
export * from "./config.ts";
export * from "./health-server.ts";
export * from "./polling-loop.ts";
export * from "./sentry-node.ts";
export * from "./worker-pool.ts";
