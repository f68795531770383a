import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@server": path.resolve(root, "./server"),
    },
  },
  test: {
    name: "server",
    environment: "node",
    include: ["test/**/*.test.ts"],
  },
});
