import { defineConfig } from "vitest/config";
import { aliases } from "./vitest.aliases";

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    exclude: defaultExclude,
    env: {
      LOG_LEVEL: "silent",
    },
    server: {
      deps: {
        inline: [/@conclave\/.*/],
      },
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json"],
      reportsDirectory: "coverage",
    },
  },
});
