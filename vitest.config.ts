import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/backend/test/**/*.test.ts"],
    environment: "node",
  },
});
