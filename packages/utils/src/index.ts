export * from "./dirs";
export * from "./env";
export * as logger from "./logger";
export * from "./type-guards";
