import type { Command } from "commander";
import { hasSubCommands, type CommandHandler } from "./handler";

/** Help text for `handler` as invoked under `name`, listing sub-commands when it has any. */
export function renderUsage(handler: CommandHandler, name: string, flags: Command): string {
  flags.name(name);
  const lines = [flags.helpInformation().trimEnd()];
  if (hasSubCommands(handler)) {
    const entries = handler.subCommands().list();
    if (entries.length > 0) {
      const width = Math.max(...entries.map((entry) => entry.name.length));
      lines.push("", "Sub-commands:");
      for (const entry of entries) {
        lines.push(`  ${entry.name.padEnd(width)}  ${entry.description}`);
      }
    }
  }
  return lines.join("\n");
}
