import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "tests/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      // Boundary coverage: the surfaces the host and the UI call into
      include: [
        "src/dispatch/fair-dispatcher.ts",
        "src/sla/pool-sla-monitor.ts",
        "src/service/fair-scheduler-service.ts",
        "src/daemon/server.ts",
        "src/metrics/exporter.ts",
        "src/events/logger.ts",
      ],
      exclude: [
        "src/**/__tests__/**",
        "src/testing/**",
        "src/schemas/**",
      ],
    },
  },
});
