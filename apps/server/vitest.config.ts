import { defineConfig, mergeConfig } from "vitest/config";
import baseVitestConfig from "../../vitest.config.base";

export default mergeConfig(
  baseVitestConfig,
  defineConfig({
    test: {
      name: "server",
      // Route tests hit the file system for uploads, scratch files and the cache.
      testTimeout: 10_000,
    },
  }),
);
