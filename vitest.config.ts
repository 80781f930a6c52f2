import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // DOM suites opt into jsdom with a `@vitest-environment jsdom` docblock.
    environment: "node",
    include: ["src/**/*.test.ts", "api/**/*.test.ts", "scripts/**/*.test.ts"],
  },
});
