import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "src/**/*.test.tsx"],
    environment: "node",
    env: {
      SKILLCHAT_LOG_LEVEL: "silent",
    },
  },
});
