import { z } from "zod";

const PathSchema = z.string().regex(/^\/\S*$/, "must be an absolute path");

export const HttpSchema = z
  .object({
    enabled: z.boolean().default(false),
    host: z.string().min(1).default("127.0.0.1"),
    port: z.coerce.number().int().min(0).max(65535).default(8080),
    // External URL web hooks are advertised under; defaults to http://<host>:<port>.
    baseUrl: z.string().url().optional(),
    webHookPrefix: PathSchema.default("/hooks"),
    metricsPath: PathSchema.default("/metrics"),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.webHookPrefix === value.metricsPath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "metricsPath must differ from webHookPrefix",
        path: ["metricsPath"],
      });
    }
  });
