export * from "./grammar";
export * from "./schema";
export * from "./types";
export * from "./validate";
