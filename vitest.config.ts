import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@switchyard/schemas": pkg("schemas"),
      "@switchyard/journal": pkg("journal"),
      "@switchyard/memory": pkg("memory"),
      "@switchyard/provider": pkg("provider"),
      "@switchyard/graph": pkg("graph"),
      "@switchyard/kernel": pkg("kernel"),
      "@switchyard/runtime": pkg("runtime"),
    },
  },
  test: {
    globals: false,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    testTimeout: 30000,
  },
});
