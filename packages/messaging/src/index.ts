export * from "./client.ts";
export * from "./keyboards.ts";
export * from "./sender.ts";
export * from "./updates.ts";
export * from "./templates/html.ts";
export * from "./templates/labels.ts";
