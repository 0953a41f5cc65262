import { tmpdir } from "os";
import { join } from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      FORCE_COLOR: "0",
      HOTPACK_CONFIG_DIR: join(tmpdir(), "hotpack-test"),
    },
  },
});
