import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["game/**/*.test.ts", "lib/**/*.test.ts"],
  },
});
