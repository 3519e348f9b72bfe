export * from "./differences";
export * from "./stats";
