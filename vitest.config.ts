import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["nec-cli/**/*.test.ts"],
    environment: "node",
  },
});
