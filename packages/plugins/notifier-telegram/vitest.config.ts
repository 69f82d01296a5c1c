import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "notifier-telegram",
    include: ["src/**/*.test.ts"],
  },
});
