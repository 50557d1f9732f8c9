import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["core/**/*.test.ts", "infra/**/*.test.ts", "src/**/*.test.ts", "services/**/*.test.ts"],
    env: { LOG_LEVEL: "silent" },
  },
})
