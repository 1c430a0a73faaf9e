import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@fwgrab/common": path.resolve(rootDir, "packages/fwgrab-common/src/index.ts"),
      "@fwgrab/download": path.resolve(rootDir, "packages/fwgrab-download/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
    restoreMocks: true
  }
});
