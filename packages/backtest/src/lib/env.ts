import { z } from "zod";
import { parseEnv } from "@tickforge/kit";

const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_DIR: z.string().min(1).optional(),
  VITEST: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;
export const env = parseEnv(EnvSchema);
