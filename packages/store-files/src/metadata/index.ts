export * from "./file-text.js";
export * from "./files-metadata-storage.js";
export * from "./package-layout.js";
export * from "./records.js";
