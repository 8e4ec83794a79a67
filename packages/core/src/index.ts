// Device flow state machine and provider port
export * from "./auth";
// File and version-control collaborator contracts
export * from "./collaborators";
// Command records, grammar and validation
export * from "./command";
// Constants
export * from "./constants";
// Error taxonomy
export * from "./errors";
// Tenant keys, session views and credential store
export * from "./session";
// Utilities
export * from "./utils";
