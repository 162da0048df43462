import { resolve } from "node:path";
import { defineConfig } from "vitest/config";

const domainEntry = resolve(__dirname, "../packages/domain/src/index.ts");

export default defineConfig({
  resolve: {
    preserveSymlinks: true,
    alias: {
      "@meritstack/domain": domainEntry,
    },
  },
  test: {
    pool: "forks",
    globals: true,
    include: ["test/**/*.spec.ts"],
  },
});
