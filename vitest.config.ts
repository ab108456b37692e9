import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@pbrtkit/ir": workspace("ir"),
      "@pbrtkit/parser": workspace("parser"),
      "@pbrtkit/engine": workspace("engine"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
  },
});
