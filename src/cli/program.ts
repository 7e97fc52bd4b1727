import { Command } from "commander";
import { APP_VERSION } from "../version";

export function createProgram(): Command {
  const program = new Command()
    .name("chatmux")
    .description("Chat bot message dispatch and command routing")
    .version(APP_VERSION);

  program
    .command("run")
    .description("Start the bot with the configured adapters")
    .option("-c, --config <path>", "Config file path")
    .action(async (options: { config?: string }) => {
      const { runBot } = await import("./commands/run");
      await runBot(options.config);
    });

  const configCmd = program.command("config").description("Inspect configuration");

  configCmd
    .command("validate")
    .description("Check the config file")
    .option("-c, --config <path>", "Config file path")
    .action(async (options: { config?: string }) => {
      const { validateConfig } = await import("./commands/config");
      await validateConfig(options.config);
    });

  configCmd
    .command("show")
    .description("Print the config with defaults applied")
    .option("-c, --config <path>", "Config file path")
    .action(async (options: { config?: string }) => {
      const { showConfig } = await import("./commands/config");
      await showConfig(options.config);
    });

  program
    .command("handlers")
    .description("List bundled handlers")
    .option("--commands", "List the chat commands they register instead")
    .action(async (options: { commands?: boolean }) => {
      const { listCommands, listHandlers } = await import("./commands/handlers");
      if (options.commands) {
        listCommands();
        return;
      }
      listHandlers();
    });

  return program;
}
