import { z } from 'zod';
import { PipelineError } from '@/lib/pipeline/errors';

export const DEFAULT_TOP_CATEGORIES: Record<string, number> = {
  city: 500,
  position: 500,
  last_position: 500,
  currency: 8
};

export const PipelineConfigSchema = z
  .object({
    targetColumn: z.string().min(1).default('salary'),
    minSalary: z.number().finite().default(5_000),
    maxSalary: z.number().finite().default(1_000_000),
    topCategories: z.record(z.string(), z.number().int().positive()).default(DEFAULT_TOP_CATEGORIES),
    /** Merged over the built-in rate table, keyed by lowercase currency token */
    currencyRates: z.record(z.string(), z.number().positive()).default({}),
    keepRawEducation: z.boolean().default(true),
    /** Unmatched education text becomes `unknown` instead of `school` */
    strictEducation: z.boolean().default(false),
    outputDir: z.string().min(1).optional()
  })
  .refine((config) => config.minSalary < config.maxSalary, {
    message: 'minSalary must be lower than maxSalary',
    path: ['minSalary']
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const pairList = z
  .string()
  .transform((value, ctx) => {
    const result: Record<string, number> = {};
    for (const entry of value.split(',')) {
      if (!entry.trim()) continue;
      const [key, raw] = entry.split('=');
      const n = Number(raw);
      if (!key?.trim() || raw === undefined || !Number.isFinite(n)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected key=number, got "${entry.trim()}"` });
        return z.NEVER;
      }
      result[key.trim().toLowerCase()] = n;
    }
    return result;
  });

// `KEY=` in a .env file means unset, not zero
const optionalNumber = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().finite().optional()
);

const EnvSchema = z.object({
  PIPELINE_TARGET: z.string().min(1).optional(),
  PIPELINE_MIN_SALARY: optionalNumber,
  PIPELINE_MAX_SALARY: optionalNumber,
  PIPELINE_TOP_CATEGORIES: pairList.optional(),
  PIPELINE_CURRENCY_RATES: pairList.optional(),
  PIPELINE_KEEP_RAW_EDUCATION: booleanFlag.optional(),
  PIPELINE_STRICT_EDUCATION: booleanFlag.optional(),
  PIPELINE_OUTPUT_DIR: z.string().min(1).optional()
});

function formatIssues(issues: z.ZodIssue[]) {
  return issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

/**
 * Builds the run configuration from `PIPELINE_*` environment variables,
 * with explicit overrides (CLI flags) taking precedence.
 */
export function loadPipelineConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: PipelineConfigInput = {}
): PipelineConfig {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new PipelineError(`Invalid environment: ${formatIssues(parsedEnv.error.issues)}`, 'INVALID_CONFIG', {
      issues: parsedEnv.error.issues
    });
  }

  const e = parsedEnv.data;
  const candidate: PipelineConfigInput = {
    targetColumn: overrides.targetColumn ?? e.PIPELINE_TARGET,
    minSalary: overrides.minSalary ?? e.PIPELINE_MIN_SALARY,
    maxSalary: overrides.maxSalary ?? e.PIPELINE_MAX_SALARY,
    topCategories: { ...DEFAULT_TOP_CATEGORIES, ...e.PIPELINE_TOP_CATEGORIES, ...overrides.topCategories },
    currencyRates: { ...e.PIPELINE_CURRENCY_RATES, ...overrides.currencyRates },
    keepRawEducation: overrides.keepRawEducation ?? e.PIPELINE_KEEP_RAW_EDUCATION,
    strictEducation: overrides.strictEducation ?? e.PIPELINE_STRICT_EDUCATION,
    outputDir: overrides.outputDir ?? e.PIPELINE_OUTPUT_DIR
  };

  const parsed = PipelineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new PipelineError(`Invalid pipeline config: ${formatIssues(parsed.error.issues)}`, 'INVALID_CONFIG', {
      issues: parsed.error.issues
    });
  }

  return parsed.data;
}
