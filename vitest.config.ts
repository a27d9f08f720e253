import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

// 测试期间的日志与默认状态目录写到临时目录
const testHome = mkdtempSync(join(tmpdir(), "flowgate-test-home-"));

export default defineConfig({
  test: {
    root: fileURLToPath(new URL(".", import.meta.url)),
    include: ["tests/**/*.spec.ts"],
    environment: "node",
    globals: false,
    env: {
      FLOWGATE_HOME: testHome,
      LOG_LEVEL: "warn"
    }
  }
});
