import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const weight = (fallback: number) => z.coerce.number().min(0).max(10).default(fallback);

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvFields = z.object({
  TEMPOCHAIN_CHUNK_SIZE_DAYS: positiveInt(90),
  TEMPOCHAIN_LAYER_DAYS: positiveInt(7),
  TEMPOCHAIN_MAX_EVENTS: positiveInt(10),
  TEMPOCHAIN_MAX_ENTITIES: positiveInt(15),
  TEMPOCHAIN_MAX_CHAINS: positiveInt(20),
  TEMPOCHAIN_WEIGHT_CONNECTIVITY: weight(0.4),
  TEMPOCHAIN_WEIGHT_ATTENTION: weight(0.35),
  TEMPOCHAIN_WEIGHT_RECENCY: weight(0.25),
  TEMPOCHAIN_VERBOSE: booleanFlag,
});

const ZERO_WEIGHTS = 'Importance weights must not all be zero';

const EnvSchema = EnvFields.superRefine((env, ctx) => {
  if (env.TEMPOCHAIN_WEIGHT_CONNECTIVITY + env.TEMPOCHAIN_WEIGHT_ATTENTION + env.TEMPOCHAIN_WEIGHT_RECENCY === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: ZERO_WEIGHTS });
  }
});

const nonNegative = z.number().finite().min(0);
const capacity = z.number().int().positive();

const EngineConfigSchema = z.object({
  layerDurationDays: z.number().int().positive(),
  chunkSizeDays: z.number().finite().positive(),
  capacities: z.object({
    maxEvents: capacity,
    maxEntities: capacity,
    maxChains: capacity,
    maxAttention: capacity,
    maxOpenQuestions: capacity,
    maxChainLength: capacity,
  }),
  weights: z
    .object({ connectivity: nonNegative, attention: nonNegative, recency: nonNegative })
    .refine(w => w.connectivity + w.attention + w.recency > 0, ZERO_WEIGHTS),
  verbose: z.boolean(),
});

export interface ImportanceWeights {
  connectivity: number;
  attention: number;
  recency: number;
}

export interface CarryoverCapacities {
  maxEvents: number;
  maxEntities: number;
  maxChains: number;
  maxAttention: number;
  maxOpenQuestions: number;
  maxChainLength: number;
}

export interface EngineConfig {
  layerDurationDays: number;
  chunkSizeDays: number;
  capacities: CarryoverCapacities;
  weights: ImportanceWeights;
  verbose: boolean;
}

export const DEFAULT_CAPACITIES: CarryoverCapacities = {
  maxEvents: 10,
  maxEntities: 15,
  maxChains: 20,
  maxAttention: 20,
  maxOpenQuestions: 10,
  maxChainLength: 12,
};

export const DEFAULT_WEIGHTS: ImportanceWeights = {
  connectivity: 0.4,
  attention: 0.35,
  recency: 0.25,
};

export const DEFAULT_CONFIG: EngineConfig = {
  layerDurationDays: 7,
  chunkSizeDays: 90,
  capacities: DEFAULT_CAPACITIES,
  weights: DEFAULT_WEIGHTS,
  verbose: false,
};

/**
 * Build the engine configuration from environment variables. Unset variables
 * fall back to defaults; malformed ones throw a ZodError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.parse(pickDefined(env));

  const weights: ImportanceWeights = {
    connectivity: parsed.TEMPOCHAIN_WEIGHT_CONNECTIVITY,
    attention: parsed.TEMPOCHAIN_WEIGHT_ATTENTION,
    recency: parsed.TEMPOCHAIN_WEIGHT_RECENCY,
  };

  return {
    layerDurationDays: parsed.TEMPOCHAIN_LAYER_DAYS,
    chunkSizeDays: parsed.TEMPOCHAIN_CHUNK_SIZE_DAYS,
    capacities: {
      ...DEFAULT_CAPACITIES,
      maxEvents: parsed.TEMPOCHAIN_MAX_EVENTS,
      maxEntities: parsed.TEMPOCHAIN_MAX_ENTITIES,
      maxChains: parsed.TEMPOCHAIN_MAX_CHAINS,
    },
    weights,
    verbose: parsed.TEMPOCHAIN_VERBOSE,
  };
}

/**
 * Fill `overrides` from the defaults and check the result: positive
 * durations and capacities, non-negative weights that are not all zero.
 */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_CONFIG, ...overrides };
  const checked = EngineConfigSchema.safeParse(config);
  if (!checked.success) {
    const details = checked.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid engine configuration: ${details}`);
  }
  return config;
}

// Empty strings count as unset
function pickDefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const key of Object.keys(EnvFields.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim().toLowerCase();
    }
  }
  return result;
}
