/**
 * Configuration centralisée — values come from the environment (.env via dotenv)
 */
import { existsSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silent'] as const;

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).catch('info'),
  SAMPLE_DATA_DIR: z.preprocess(v => v || undefined, z.string().optional()),
});

/**
 * Sample mission files ship at the package root.
 * Sources: src/utils → ../../sample_data; build: dist/src/utils → ../../../sample_data
 */
function defaultSampleDataDir(): string {
  const candidate1 = path.join(__dirname, '..', '..', 'sample_data');
  const candidate2 = path.join(__dirname, '..', '..', '..', 'sample_data');
  return existsSync(candidate1) ? candidate1 : candidate2;
}

const env = EnvSchema.parse(process.env);

export const SCANNER_CONFIG = Object.freeze({
  logLevel: env.LOG_LEVEL,
  sampleDataDir: env.SAMPLE_DATA_DIR ?? defaultSampleDataDir(),
});
