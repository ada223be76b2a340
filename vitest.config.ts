import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
    setupFiles: ["./src/test/state-mock.ts"],
  },
});
