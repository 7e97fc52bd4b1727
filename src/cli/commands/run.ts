import { loadConfig } from "../../config";
import { BotHost, registerProcessErrorHandlers } from "../../host";

export async function runBot(configPath?: string): Promise<void> {
  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    console.error(`❌ Cannot start, invalid config: ${result.path}`);
    for (const error of result.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exitCode = 1;
    return;
  }

  registerProcessErrorHandlers();
  const host = new BotHost(result.config);
  const shutdown = () => {
    void host.stop();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await host.start();
    await host.wait();
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
    await host.stop();
  }
}
