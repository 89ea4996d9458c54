import { z } from 'zod';
import { format as formatDate, parse } from 'date-fns';
import { ENV_PREFIX, PIPELINE_DEFAULTS } from '@incident-atlas/shared';
import { Dimension } from '../types';
import { ConfigError } from '../utils/errors';

// Tried in order; day-first before month-first so 05/01/2020 reads as 5 January
export const DEFAULT_DATE_FORMATS = [
  'yyyy-MM-dd',
  'yyyy/MM/dd',
  'yyyyMMdd',
  'dd/MM/yyyy',
  'dd-MM-yyyy',
  'dd.MM.yyyy',
  'MM/dd/yyyy',
  'MM-dd-yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
  'dd-MMM-yyyy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'MMM d yyyy',
  'MMMM d yyyy'
] as const;

export const DEFAULT_DIMENSIONS: Dimension[] = [
  Dimension.YEAR,
  Dimension.OPERATOR,
  Dimension.DAMAGE_LEVEL,
  Dimension.GEOGRAPHY,
  Dimension.YEAR_DAMAGE_LEVEL,
  Dimension.OPERATOR_DAMAGE_LEVEL
];

const SAMPLE_DATE = new Date(2020, 0, 5);

/**
 * A pattern is usable when date-fns can both render and read it back.
 * date-fns throws RangeError for tokens such as YYYY or DD, or for unescaped letters.
 */
export function isUsableDateFormat(pattern: string): boolean {
  try {
    parse(formatDate(SAMPLE_DATE, pattern), pattern, SAMPLE_DATE);
    return true;
  } catch {
    return false;
  }
}

const DateFormatSchema = z
  .string()
  .min(1)
  .refine(isUsableDateFormat, pattern => ({ message: `Unsupported date format "${pattern}"` }));

const DimensionSchema = z.enum([
  Dimension.YEAR,
  Dimension.OPERATOR,
  Dimension.DAMAGE_LEVEL,
  Dimension.GEOGRAPHY,
  Dimension.AIRCRAFT_TYPE,
  Dimension.LOCATION,
  Dimension.FATALITY_RANGE,
  Dimension.YEAR_DAMAGE_LEVEL,
  Dimension.OPERATOR_DAMAGE_LEVEL
]);

// Configuration schema
export const PipelineConfigSchema = z.object({
  maxArchiveDepth: z.number().int().min(0).max(32).default(PIPELINE_DEFAULTS.MAX_ARCHIVE_DEPTH),
  maxExtractedBytes: z.number().int().positive().default(PIPELINE_DEFAULTS.MAX_EXTRACTED_BYTES),
  invalidFractionThreshold: z.number().min(0).max(1).default(PIPELINE_DEFAULTS.INVALID_FRACTION_THRESHOLD),
  gridResolution: z.number().positive().max(180).default(PIPELINE_DEFAULTS.GRID_RESOLUTION),
  deadlineMs: z.number().int().positive().default(PIPELINE_DEFAULTS.DEADLINE_MS),
  strict: z.boolean().default(false),
  dimensions: z.array(DimensionSchema).min(1).default(DEFAULT_DIMENSIONS),
  concurrency: z.number().int().min(1).max(64).default(PIPELINE_DEFAULTS.CONCURRENCY),
  batchSize: z.number().int().min(1).default(PIPELINE_DEFAULTS.BATCH_SIZE),
  dateFormats: z.array(DateFormatSchema).min(1).default([...DEFAULT_DATE_FORMATS]),
  outputDir: z.string().min(1).default('output'),
  geocodeCachePath: z.string().min(1).optional()
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

type EnvSource = Record<string, string | undefined>;

const NUMERIC_ENV_KEYS = {
  MAX_ARCHIVE_DEPTH: 'maxArchiveDepth',
  MAX_EXTRACTED_BYTES: 'maxExtractedBytes',
  INVALID_FRACTION_THRESHOLD: 'invalidFractionThreshold',
  GRID_RESOLUTION: 'gridResolution',
  DEADLINE_MS: 'deadlineMs',
  CONCURRENCY: 'concurrency',
  BATCH_SIZE: 'batchSize'
} as const;

function readEnv(env: EnvSource): PipelineConfigInput {
  const fromEnv: PipelineConfigInput = {};

  for (const [suffix, key] of Object.entries(NUMERIC_ENV_KEYS)) {
    const raw = env[`${ENV_PREFIX}${suffix}`];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new ConfigError(`${ENV_PREFIX}${suffix} must be numeric, got "${raw}"`);
    }
    fromEnv[key] = value;
  }

  const strict = env[`${ENV_PREFIX}STRICT`];
  if (strict !== undefined && strict.trim() !== '') {
    fromEnv.strict = ['true', '1', 'yes', 'on'].includes(strict.trim().toLowerCase());
  }

  const dimensions = env[`${ENV_PREFIX}DIMENSIONS`];
  if (dimensions !== undefined && dimensions.trim() !== '') {
    const parsed = z.array(DimensionSchema).safeParse(
      dimensions.split(',').map(d => d.trim()).filter(Boolean)
    );
    if (!parsed.success) {
      throw new ConfigError(`${ENV_PREFIX}DIMENSIONS has an unknown dimension: "${dimensions}"`);
    }
    fromEnv.dimensions = parsed.data;
  }

  const outputDir = env[`${ENV_PREFIX}OUTPUT_DIR`];
  if (outputDir) fromEnv.outputDir = outputDir;

  const geocodeCachePath = env[`${ENV_PREFIX}GEOCODE_CACHE`];
  if (geocodeCachePath) fromEnv.geocodeCachePath = geocodeCachePath;

  return fromEnv;
}

/**
 * Build the run configuration: schema defaults, then INCIDENT_ATLAS_* environment
 * variables, then explicit overrides.
 */
export function loadPipelineConfig(
  overrides: PipelineConfigInput = {},
  env: EnvSource = process.env
): PipelineConfig {
  const result = PipelineConfigSchema.safeParse({ ...readEnv(env), ...overrides });
  if (!result.success) {
    const msg = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid pipeline configuration: ${msg}`);
  }
  return result.data;
}
