import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const root = fileURLToPath(new URL("./", import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    // Package-level setup silences the shared logger before modules load.
    setupFiles: [path.join(root, "packages/core/src/test/setup.ts")],
  },
});
