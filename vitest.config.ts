import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));
const src = path.resolve(root, "packages/blockir/src");

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "#errors": path.resolve(src, "errors.ts"),
      "#result": path.resolve(src, "result.ts"),
      "#infra": path.resolve(src, "infra/index.ts"),
      "#ir": path.resolve(src, "ir/index.ts"),
      "#simplify": path.resolve(src, "simplify/index.ts"),
    },
  },
});
