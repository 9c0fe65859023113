import * as v from "valibot";

/** Iterations per randomized test; `QUICK_TEST` drops it to {@link QUICK_ITERATIONS}. */
export const DEFAULT_ITERATIONS = 10;
export const QUICK_ITERATIONS = 4;
export const DEFAULT_SEED = 0x5eed;
export const DEFAULT_NODE_COUNT = 8;
export const DEFAULT_MAX_MUTATIONS = 1000;

const positiveInt = v.pipe(v.number(), v.integer(), v.minValue(1));

export const harnessConfigSchema = v.object({
  iterations: v.optional(positiveInt, DEFAULT_ITERATIONS),
  seed: v.optional(v.pipe(v.number(), v.integer()), DEFAULT_SEED),
  logLevel: v.optional(
    v.picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "silent",
  ),
  prettyLogs: v.optional(v.boolean(), false),
  nodeCount: v.optional(positiveInt, DEFAULT_NODE_COUNT),
  maxMutations: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0)), DEFAULT_MAX_MUTATIONS),
});

export type HarnessConfig = v.InferOutput<typeof harnessConfigSchema>;
export type HarnessConfigInput = v.InferInput<typeof harnessConfigSchema>;

/**
 * Builds a config from explicit overrides, then the given environment, then
 * defaults. Nothing is read from `process.env` unless the caller passes it.
 */
export const loadConfig = (
  overrides: HarnessConfigInput = {},
  env: Readonly<Record<string, string | undefined>> = {},
): HarnessConfig => {
  const fromEnv: Record<string, unknown> = {};
  if (env.QUICK_TEST !== undefined) fromEnv.iterations = QUICK_ITERATIONS;
  if (env.SEED !== undefined) fromEnv.seed = Number(env.SEED);
  if (env.LOG_LEVEL !== undefined) fromEnv.logLevel = env.LOG_LEVEL;
  return v.parse(harnessConfigSchema, { ...fromEnv, ...overrides });
};
