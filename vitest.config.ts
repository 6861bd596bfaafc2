import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const local = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@vadpoint/contracts": local("./packages/contracts/index.ts"),
      "@vadpoint/engine": local("./packages/engine/src/index.ts"),
      "@vadpoint/adapters": local("./packages/adapters/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
  },
});
