import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const dir = fileURLToPath(new URL("./", import.meta.url));

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    setupFiles: [path.join(dir, "src/test/setup.ts")],
  },
});
