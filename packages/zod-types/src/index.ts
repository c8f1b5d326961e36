export * from "./discovery.zod";
export * from "./registry.zod";
