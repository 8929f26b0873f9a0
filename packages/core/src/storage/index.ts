export * from "./metadata-storage.js";
