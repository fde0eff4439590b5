import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@skein/parser",
    globals: true,
    environment: "node",
  },
});
