export { finiteOr } from "./finite-or.js";
export { isPositiveInt } from "./is-positive-int.js";
export { parseEnv } from "./parse-env.js";
export { formatZodError, formatZodErrors } from "./zod-helpers.js";
