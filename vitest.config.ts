import { defineConfig } from "vitest/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const projectRoot = fileURLToPath(new URL(".", import.meta.url));
const packagesRoot = resolve(projectRoot, "packages");

export default defineConfig({
  resolve: {
    alias: {
      "@gradus/statics/diagnostics": resolve(
        packagesRoot,
        "statics/src/diagnostics/index.ts"
      ),
      "@gradus/statics": resolve(packagesRoot, "statics/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    pool: "threads",
    hookTimeout: 30000,
  },
});
