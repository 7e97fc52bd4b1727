import { z } from "zod";

export const BotSchema = z
  .object({
    // Name of the top-level mux, used in logs.
    name: z.string().min(1).default("chatmux"),
    // Name replies are attributed to.
    nick: z.string().min(1).default("minion"),
  })
  .strict();
