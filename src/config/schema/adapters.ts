import { z } from "zod";

export const ShellAdapterSchema = z
  .object({
    enabled: z.boolean().default(true),
    // Defaults to $USER.
    user: z.string().min(1).optional(),
    prompt: z.string().default("> "),
  })
  .strict();

export const AdaptersSchema = z
  .object({
    shell: ShellAdapterSchema.default({}),
  })
  .strict();
