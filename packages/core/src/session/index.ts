export * from "./credential-store";
export * from "./tenant-key";
export * from "./types";
