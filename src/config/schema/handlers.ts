import { z } from "zod";
import { BUNDLED_HANDLERS } from "../../handlers";

export const HandlersSchema = z
  .object({
    enabled: z.array(z.enum(BUNDLED_HANDLERS)).default([...BUNDLED_HANDLERS]),
  })
  .strict();
