import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pullseq/core",
    globals: true,
    environment: "node",
  },
});
