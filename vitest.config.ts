import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    watch: false,
  },
  resolve: {
    alias: {
      "@metastore/core": packageSource("core"),
      "@metastore/store-mem": packageSource("store-mem"),
      "@metastore/store-files": packageSource("store-files"),
      "@metastore/store-github": packageSource("store-github"),
      "@metastore/testing": packageSource("testing"),
      "@metastore/metastore": packageSource("metastore"),
    },
  },
});
