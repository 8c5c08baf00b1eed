import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: { target: "es2022" },
  test: {
    coverage: {
      provider: "v8",
      reporter: process.env.CI ? ["lcovonly"] : ["html", "text-summary"],
      include: [process.env.COVERPKG ? `${process.env.COVERPKG}/src/**/*.ts` : "pkg/**/src/**/*.ts"],
    },
    include: [
      "pkg/**/tests/**/*.t.ts",
    ],
    teardownTimeout: 30000,
    watch: false,
  },
});
