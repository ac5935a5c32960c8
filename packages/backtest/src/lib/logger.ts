import pino from "pino";
import { join } from "node:path";
import { env } from "./env.js";

/** Per-module log level overrides, set at runtime via logger.setLogConfig() */
let logLevelOverrides: Record<string, pino.LevelWithSilent> = {};

function createPinoLogger(): pino.Logger {
  if (env.VITEST) {
    return pino({ level: "silent" });
  }

  const level = env.LOG_LEVEL;
  if (!env.LOG_DIR) {
    return pino({ level });
  }

  return pino(
    { level },
    pino.transport({
      targets: [
        { target: "pino/file", level, options: { destination: 1 } },
        {
          target: "pino-roll",
          level,
          options: {
            file: join(env.LOG_DIR, "backtest"),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
}

const pinoInstance = createPinoLogger();

/** Base pino instance plus a level-override setter and a child factory. */
export const logger = Object.assign(pinoInstance, {
  setLogConfig(overrides: Record<string, pino.LevelWithSilent>): void {
    logLevelOverrides = overrides;
  },

  createChild(module: string): pino.Logger {
    const level = logLevelOverrides[module];
    const child = pinoInstance.child({ module });
    if (level) {
      child.level = level;
    }
    return child;
  },
});
