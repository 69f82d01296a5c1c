import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "source-jules",
    include: ["src/**/*.test.ts"],
  },
});
