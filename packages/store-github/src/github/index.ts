export * from "./github-json.js";
export * from "./github-repository-host.js";
