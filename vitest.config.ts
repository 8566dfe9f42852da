import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig(async () => {
  const { default: tsconfigPaths } = await import("vite-tsconfig-paths");

  return {
    plugins: [tsconfigPaths()],
    resolve: {
      alias: {
        "server-only": path.resolve(rootDir, "src/test/mocks/server-only.ts"),
      },
    },
    test: {
      environment: "node",
      include: ["src/**/*.test.ts", "src/**/*.spec.ts"],
      clearMocks: true,
      globals: true,
    },
  };
});
