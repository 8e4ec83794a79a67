export * from "./device-flow";
