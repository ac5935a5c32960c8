import { z } from "zod";

const maybeNaN = z.union([z.number(), z.nan()]);

export const FixedStopsSchema = z.object({
  mode: z.literal("fixed"),
  slPct: z.number().nonnegative(), // e.g. 0.02 = 2% below a long entry
  tpPct: z.number().nonnegative().default(0), // 0 disables take-profit
});

export const AtrStopsSchema = z.object({
  mode: z.literal("atr"),
  slMult: z.number().nonnegative(),
  tpMult: z.number().nonnegative().default(0), // 0 disables take-profit
  // per-bar ATR, sampled once at entry
  atr: z.array(maybeNaN),
});

export const StopConfigSchema = z.discriminatedUnion("mode", [FixedStopsSchema, AtrStopsSchema]);

export const SimulationOptionsSchema = z.object({
  stops: StopConfigSchema,
  allowShort: z.boolean().default(false),
  initialCash: z.number().positive().default(10_000),
});

export type StopConfig = z.output<typeof StopConfigSchema>;
export type SimulationOptions = z.input<typeof SimulationOptionsSchema>;
export type ResolvedSimulationOptions = z.output<typeof SimulationOptionsSchema>;
