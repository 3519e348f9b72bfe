export * from "./formatReport";
export * from "./chart";
