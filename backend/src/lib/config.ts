import { z } from 'zod';
import { SourceId } from '@mrm/shared';
import { OrchestrationError } from './errors.js';

// Environment configuration
export const config = {
  // AWS Region
  region: process.env.AWS_REGION || 'us-east-1',

  // DynamoDB Tables
  tables: {
    profiles: process.env.PROFILES_TABLE || 'MrmProfiles',
  },

  // Storage backend for the HTTP handler
  store: process.env.MRM_STORE === 'memory' ? 'memory' : 'dynamodb',

  // API settings
  api: {
    defaultPageSize: 20,
    maxPageSize: 100,
  },

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;

const weightSchema = z.number().min(0).max(1);

export const sourceWeightSchema = z.object({
  generic: weightSchema,
  person: weightSchema.optional(),
});
export type SourceWeight = z.infer<typeof sourceWeightSchema>;

export type ReliabilityTable = Record<SourceId, SourceWeight>;

export const DEFAULT_RELIABILITY_WEIGHTS: ReliabilityTable = {
  registry_api: { generic: 0.95 },
  regulatory_filing: { generic: 0.9 },
  official_website: { generic: 0.85 },
  professional_network: { generic: 0.7, person: 0.8 },
  manual_curation: { generic: 0.7 },
  third_party: { generic: 0.5 },
};

export const engineConfigSchema = z.object({
  completenessThreshold: z.number().gt(0).max(1),
  stalenessDays: z.number().int().min(1),
  subBatchSize: z.number().int().min(1),
  concurrency: z.number().int().min(1).max(64),
  interSourceDelayMs: z.number().int().min(0),
  interBatchCooldownMs: z.number().int().min(0),
  storageRetryDelayMs: z.number().int().min(0),
  taskDueDays: z.number().int().min(1),
  priorityRankCutoff: z.number().int().min(1),
  reliabilityWeights: z.record(z.nativeEnum(SourceId), sourceWeightSchema),
});
export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  completenessThreshold: 0.6,
  stalenessDays: 30,
  subBatchSize: 5,
  concurrency: 4,
  interSourceDelayMs: 1000,
  interBatchCooldownMs: 5000,
  storageRetryDelayMs: 250,
  taskDueDays: 14,
  priorityRankCutoff: 50,
  reliabilityWeights: DEFAULT_RELIABILITY_WEIGHTS,
};

const ENV_NUMBERS = {
  completenessThreshold: 'MRM_COMPLETENESS_THRESHOLD',
  stalenessDays: 'MRM_STALENESS_DAYS',
  subBatchSize: 'MRM_SUB_BATCH_SIZE',
  concurrency: 'MRM_CONCURRENCY',
  interSourceDelayMs: 'MRM_INTER_SOURCE_DELAY_MS',
  interBatchCooldownMs: 'MRM_INTER_BATCH_COOLDOWN_MS',
  storageRetryDelayMs: 'MRM_STORAGE_RETRY_DELAY_MS',
  taskDueDays: 'MRM_TASK_DUE_DAYS',
  priorityRankCutoff: 'MRM_PRIORITY_RANK_CUTOFF',
} as const;

function readWeightOverrides(raw: string | undefined): Partial<ReliabilityTable> {
  if (!raw) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new OrchestrationError('MRM_RELIABILITY_WEIGHTS is not valid JSON');
  }
  const result = z.partialRecord(z.nativeEnum(SourceId), sourceWeightSchema).safeParse(parsed);
  if (!result.success) {
    throw new OrchestrationError('MRM_RELIABILITY_WEIGHTS is invalid', {
      issues: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Build the engine configuration from environment variables, with explicit
 * overrides taking precedence. Throws OrchestrationError when the result is invalid.
 */
export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const fromEnv: Record<string, unknown> = {};
  for (const [field, variable] of Object.entries(ENV_NUMBERS)) {
    const raw = env[variable];
    if (raw !== undefined && raw.trim() !== '') {
      fromEnv[field] = Number(raw);
    }
  }

  const candidate = {
    ...DEFAULT_ENGINE_CONFIG,
    ...fromEnv,
    ...overrides,
    reliabilityWeights: {
      ...DEFAULT_RELIABILITY_WEIGHTS,
      ...readWeightOverrides(env.MRM_RELIABILITY_WEIGHTS),
      ...overrides.reliabilityWeights,
    },
  };

  const result = engineConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new OrchestrationError('Invalid engine configuration', {
      issues: result.error.issues,
    });
  }
  return result.data;
}
