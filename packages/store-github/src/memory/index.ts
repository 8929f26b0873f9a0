export * from "./memory-repository-host.js";
