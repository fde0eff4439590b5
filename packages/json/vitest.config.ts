import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@skein/json",
    globals: true,
    environment: "node",
  },
});
