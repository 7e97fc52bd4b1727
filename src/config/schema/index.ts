import { z } from "zod";
import { AdaptersSchema } from "./adapters";
import { BotSchema } from "./bot";
import { HandlersSchema } from "./handlers";
import { HttpSchema } from "./http";
import { LoggingSchema } from "./logging";

export const ChatmuxConfigSchema = z
  .object({
    $schema: z.string().optional(),
    logging: LoggingSchema.optional(),
    bot: BotSchema.default({}),
    adapters: AdaptersSchema.default({}),
    http: HttpSchema.default({}),
    handlers: HandlersSchema.default({}),
  })
  .strict();

export type ChatmuxConfig = z.infer<typeof ChatmuxConfigSchema>;
export type ChatmuxConfigInput = z.input<typeof ChatmuxConfigSchema>;

export { AdaptersSchema, ShellAdapterSchema } from "./adapters";
export { BotSchema } from "./bot";
export { HandlersSchema } from "./handlers";
export { HttpSchema } from "./http";
export { LoggingSchema } from "./logging";
