import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Workspace packages resolve to their sources so tests need no build first
    alias: {
      "@viewbind/model": fromRoot("./packages/model/src/index.ts"),
      "@viewbind/codegen": fromRoot("./packages/codegen/src/index.ts"),
      "@viewbind/attach": fromRoot("./packages/attach/src/index.ts"),
      "@viewbind/sync": fromRoot("./packages/sync/src/index.ts"),
    },
  },
});
