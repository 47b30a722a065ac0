import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    setupFiles: ["./src/test/setup.ts"],
  },
});
