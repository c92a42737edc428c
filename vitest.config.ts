// vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.spec.ts"],
    restoreMocks: true,
    watch: false,
    reporters: ["default"],
  },
});
