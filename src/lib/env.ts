import os from 'node:os';

import { z } from 'zod';

const cpuCount = Math.max(1, os.availableParallelism());

const clockTimeSchema = z
  .string()
  .regex(/^\d{2}:\d{2}$/, 'Expected HH:mm')
  .refine((value) => {
    const [h, m] = value.split(':').map((part) => Number(part));
    return (
      Number.isInteger(h) &&
      Number.isInteger(m) &&
      h >= 0 &&
      h <= 23 &&
      m >= 0 &&
      m <= 59
    );
  }, 'Invalid time');

const fractionSchema = z.coerce.number().min(0).max(0.9);

const flagSchema = z.union([
  z.boolean(),
  z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1'),
]);

export const sorterSettingsSchema = z
  .object({
    cropTop: fractionSchema.default(0.08),
    cropBottom: fractionSchema.default(0.2),
    maxWidth: z.coerce.number().int().positive().default(1600),
    concurrency: z.coerce.number().int().min(1).default(cpuCount),
    ocrWorkers: z.coerce
      .number()
      .int()
      .min(1)
      .default(Math.min(cpuCount, 4)),
    imageThreads: z.coerce.number().int().min(1).default(8),
    batchSize: z.coerce.number().int().min(1).default(50),
    tradingStart: clockTimeSchema.default('09:00'),
    tradingEnd: clockTimeSchema.default('15:59'),
    adjacencyTolerance: z.coerce.number().min(0).default(24),
    strikeMin: z.coerce.number().int().positive().default(100),
    strikeMax: z.coerce.number().int().positive().default(150000),
    recoverDroppedDecimal: flagSchema.default(true),
    companyMatch: z.enum(['exact', 'substring']).default('exact'),
    ocrDevice: z.enum(['accelerated', 'cpu']).default('accelerated'),
    ocrLanguage: z.string().min(1).default('eng'),
    ocrLangPath: z.string().min(1).optional(),
    timezone: z.string().min(1).default('Asia/Kolkata'),
    dateFormat: z.string().min(1).default('dd-MM-yyyy'),
    filePrefix: z.string().default('screenshot'),
    timeSeparator: z
      .string()
      .length(1)
      .refine((value) => !/[\\/]/.test(value), 'Not allowed in filenames')
      .default(';'),
    reportDir: z.string().min(1).optional(),
  })
  .refine((s) => s.cropTop + s.cropBottom < 1, {
    message: 'cropTop + cropBottom must leave part of the image',
    path: ['cropBottom'],
  })
  .refine((s) => s.tradingStart <= s.tradingEnd, {
    message: 'tradingStart must not be after tradingEnd',
    path: ['tradingEnd'],
  })
  .refine((s) => s.strikeMin <= s.strikeMax, {
    message: 'strikeMin must not exceed strikeMax',
    path: ['strikeMax'],
  });

export type SorterSettings = z.infer<typeof sorterSettingsSchema>;

export type SettingsOverrides = Partial<Record<keyof SorterSettings, unknown>>;

const envKeys: ReadonlyArray<[keyof SorterSettings, string]> = [
  ['cropTop', 'SORTER_CROP_TOP'],
  ['cropBottom', 'SORTER_CROP_BOTTOM'],
  ['maxWidth', 'SORTER_MAX_WIDTH'],
  ['concurrency', 'SORTER_CONCURRENCY'],
  ['ocrWorkers', 'SORTER_OCR_WORKERS'],
  ['imageThreads', 'SORTER_IMAGE_THREADS'],
  ['batchSize', 'SORTER_BATCH_SIZE'],
  ['tradingStart', 'SORTER_TRADING_START'],
  ['tradingEnd', 'SORTER_TRADING_END'],
  ['adjacencyTolerance', 'SORTER_ADJACENCY_TOLERANCE'],
  ['strikeMin', 'SORTER_STRIKE_MIN'],
  ['strikeMax', 'SORTER_STRIKE_MAX'],
  ['recoverDroppedDecimal', 'SORTER_RECOVER_DROPPED_DECIMAL'],
  ['companyMatch', 'SORTER_COMPANY_MATCH'],
  ['ocrDevice', 'SORTER_OCR_DEVICE'],
  ['ocrLanguage', 'SORTER_OCR_LANGUAGE'],
  ['ocrLangPath', 'SORTER_OCR_LANG_PATH'],
  ['timezone', 'SORTER_TIMEZONE'],
  ['dateFormat', 'SORTER_DATE_FORMAT'],
  ['filePrefix', 'SORTER_FILE_PREFIX'],
  ['timeSeparator', 'SORTER_TIME_SEPARATOR'],
  ['reportDir', 'SORTER_REPORT_DIR'],
];

function getRawEnv(env: NodeJS.ProcessEnv): SettingsOverrides {
  const raw: SettingsOverrides = {};
  for (const [key, envName] of envKeys) {
    const value = env[envName];
    if (value === undefined || value.trim().length === 0) continue;
    raw[key] = value.trim();
  }
  return raw;
}

function definedOnly(values: SettingsOverrides): SettingsOverrides {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined),
  );
}

export function loadSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): SorterSettings {
  const parsed = sorterSettingsSchema.safeParse({
    ...getRawEnv(env),
    ...definedOnly(overrides),
  });
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid settings: ${message}`);
  }
  return parsed.data;
}

export function isDebugEnabled(): boolean {
  return process.env.SORTER_DEBUG === '1';
}
