import process from "node:process";

import { loadEngineConfig } from "../../shared/config/engineConfig.js";
import { flushLogs } from "../../shared/logging/logger.js";
import { createFlowgateContainer } from "./di/container.js";
import { createFlowgateService, DEFAULT_BASE_PATH } from "./server.js";

async function main() {
  const port = Number(process.env.FLOWGATE_PORT ?? process.env.PORT ?? "3000");
  const host = process.env.FLOWGATE_HOST ?? process.env.HOST ?? "127.0.0.1";
  const basePath = process.env.FLOWGATE_BASE_PATH ?? DEFAULT_BASE_PATH;

  const config = await loadEngineConfig();
  const container = createFlowgateContainer({ config });
  const app = await createFlowgateService({ container, basePath });
  const supervisor = container.resolve("supervisor");

  const close = async () => {
    console.log("\n正在关闭服务...");
    supervisor.stop();
    await app.close();
    flushLogs();
    console.log("✓ 服务已关闭");
  };

  process.on("SIGINT", () => {
    void close().finally(() => process.exit(0));
  });
  process.on("SIGTERM", () => {
    void close().finally(() => process.exit(0));
  });

  const address = await app.listen({ port, host });
  supervisor.start();
  // 启动时先扫一次，接管上次进程遗留的执行
  await supervisor.sweep();
  console.log(`\n✅ flowgate 已启动：${address}${basePath}`);
  console.log(`   监督扫描: ${config.supervisor.schedule}`);
}

main().catch((error: unknown) => {
  console.error("flowgate 启动失败", error);
  process.exit(1);
});
