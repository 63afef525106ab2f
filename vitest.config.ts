import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["core/src/**/*.test.ts", "adapters/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
})
