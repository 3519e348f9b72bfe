export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./env";
export * from "./utils/logger";
