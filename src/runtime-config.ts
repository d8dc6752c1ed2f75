import fs from 'fs';
import { z } from 'zod';
import { RUNTIME_CONFIG_PATH } from './paths.js';

const autonomyLevelSchema = z.enum(['read_only', 'supervised', 'full']);
export type AutonomyLevel = z.infer<typeof autonomyLevelSchema>;

export const AUTONOMY_LEVELS: readonly AutonomyLevel[] = autonomyLevelSchema.options;

export type TemperatureBand = {
  min: number;
  max: number;
};

const temperatureBandSchema = z.object({
  min: z.number(),
  max: z.number()
});

const autonomySchema = z.object({
  level: autonomyLevelSchema,
  rollout: z.object({
    enabled: z.boolean(),
    stage: z.union([z.literal(''), autonomyLevelSchema])
  }),
  temperatureBands: z.object({
    read_only: temperatureBandSchema,
    supervised: temperatureBandSchema,
    full: temperatureBandSchema
  }),
  verifyRepair: z.object({
    maxAttempts: z.number().int(),
    maxRepairDepth: z.number().int().nonnegative()
  }),
  maxActionsPerHour: z.number().int().nonnegative(),
  maxActionsPerEntityPerHour: z.number().int().nonnegative(),
  maxCostPerDayCents: z.number().int().nonnegative(),
  maxToolLoopIterations: z.number().int().positive()
});

const personaLimitsSchema = z.object({
  maxOpenLoops: z.number().int().nonnegative(),
  maxNextActions: z.number().int().nonnegative(),
  maxCommitments: z.number().int().nonnegative(),
  maxCurrentObjectiveChars: z.number().int().positive(),
  maxRecentContextSummaryChars: z.number().int().positive(),
  maxListItemChars: z.number().int().positive()
});

const runtimeConfigSchema = z.object({
  host: z.object({
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    metrics: z.object({
      enabled: z.boolean()
    })
  }),
  agent: z.object({
    model: z.string().min(1),
    temperature: z.number()
  }),
  autonomy: autonomySchema,
  persona: z.object({
    enabled: z.boolean(),
    personId: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'persona.personId must be a simple identifier'),
    mirrorFilename: z.string().min(1),
    reflectModel: z.string(),
    limits: personaLimitsSchema
  }),
  memory: z.object({
    autoSave: z.boolean(),
    dbPath: z.string(),
    tenantMode: z.object({
      enabled: z.boolean(),
      tenantId: z.string()
    })
  })
}).superRefine((config, ctx) => {
  for (const level of AUTONOMY_LEVELS) {
    const problem = validateTemperatureBand(config.autonomy.temperatureBands[level], level);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['autonomy', 'temperatureBands', level], message: problem });
    }
  }
  const caps = config.autonomy.verifyRepair;
  if (caps.maxAttempts < 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['autonomy', 'verifyRepair', 'maxAttempts'],
      message: 'autonomy.verifyRepair.maxAttempts must be >= 1'
    });
  } else if (caps.maxRepairDepth >= caps.maxAttempts) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['autonomy', 'verifyRepair', 'maxRepairDepth'],
      message: 'autonomy.verifyRepair.maxRepairDepth must be < autonomy.verifyRepair.maxAttempts'
    });
  }
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
export type AutonomyConfig = RuntimeConfig['autonomy'];
export type PersonaLimits = RuntimeConfig['persona']['limits'];

export const DEFAULT_TEMPERATURE_BANDS: Record<AutonomyLevel, TemperatureBand> = {
  read_only: { min: 0.0, max: 0.2 },
  supervised: { min: 0.2, max: 0.7 },
  full: { min: 0.2, max: 1.0 }
};

const DEFAULT_CONFIG: RuntimeConfig = {
  host: {
    logLevel: 'info',
    metrics: {
      enabled: true
    }
  },
  agent: {
    model: 'default',
    temperature: 0.7
  },
  autonomy: {
    level: 'supervised',
    rollout: {
      enabled: false,
      stage: ''
    },
    temperatureBands: DEFAULT_TEMPERATURE_BANDS,
    verifyRepair: {
      maxAttempts: 3,
      maxRepairDepth: 2
    },
    maxActionsPerHour: 20,
    maxActionsPerEntityPerHour: 20,
    maxCostPerDayCents: 500,
    maxToolLoopIterations: 10
  },
  persona: {
    enabled: false,
    personId: 'default',
    mirrorFilename: 'STATE.md',
    reflectModel: '',
    limits: {
      maxOpenLoops: 7,
      maxNextActions: 3,
      maxCommitments: 5,
      maxCurrentObjectiveChars: 280,
      maxRecentContextSummaryChars: 1200,
      maxListItemChars: 240
    }
  },
  memory: {
    autoSave: true,
    dbPath: '',
    tenantMode: {
      enabled: false,
      tenantId: ''
    }
  }
};

let cachedConfig: RuntimeConfig | null = null;

/**
 * Returns a problem description, or null when the band is usable.
 */
export function validateTemperatureBand(band: TemperatureBand, label: string): string | null {
  if (Number.isNaN(band.min) || Number.isNaN(band.max)) {
    return `autonomy.temperatureBands.${label} min/max must not be NaN`;
  }
  if (!(band.min >= 0 && band.min <= 2)) {
    return `autonomy.temperatureBands.${label} min must be in [0.0, 2.0]`;
  }
  if (!(band.max >= 0 && band.max <= 2)) {
    return `autonomy.temperatureBands.${label} max must be in [0.0, 2.0]`;
  }
  if (band.min > band.max) {
    return `autonomy.temperatureBands.${label} min must be <= max`;
  }
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeDefaults(base: unknown, overrides: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(overrides)) return structuredClone(base);
  const result: Record<string, unknown> = structuredClone(base);
  for (const [key, value] of Object.entries(overrides)) {
    const current = base[key];
    if (isPlainObject(current) && isPlainObject(value)) {
      result[key] = mergeDefaults(current, value);
      continue;
    }
    if (Array.isArray(current) && Array.isArray(value)) {
      result[key] = value;
      continue;
    }
    // Unknown keys and type mismatches keep the default
    if (current !== undefined && typeof value === typeof current) {
      result[key] = value;
    }
  }
  return result;
}

function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  const raw = fs.readFileSync(filePath, 'utf-8');
  if (!raw.trim()) return null;
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws on any out-of-range value.
 */
export function buildRuntimeConfig(overrides: unknown = null): RuntimeConfig {
  const merged = mergeDefaults(DEFAULT_CONFIG, overrides);
  const parsed = runtimeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(`Invalid runtime config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function getRuntimeConfigPath(): string {
  return RUNTIME_CONFIG_PATH;
}

export function loadRuntimeConfig(): RuntimeConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = buildRuntimeConfig(readJson(RUNTIME_CONFIG_PATH));
  return cachedConfig;
}

export function resetRuntimeConfigCacheForTests(): void {
  cachedConfig = null;
}
