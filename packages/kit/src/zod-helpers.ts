import type { z } from "zod";

export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
}

/** Single-line form, for error messages. */
export function formatZodError(error: z.ZodError): string {
  return formatZodErrors(error).join("; ");
}
