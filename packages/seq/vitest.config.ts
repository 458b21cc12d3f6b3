import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pullseq/seq",
    globals: true,
    environment: "node",
  },
});
