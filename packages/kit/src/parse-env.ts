import type { z } from "zod";

/** Validates `process.env` against a schema; defaults declared on the schema apply. */
export function parseEnv<T extends z.ZodTypeAny>(schema: T): z.output<T> {
  return schema.parse(process.env);
}
