import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { PipelineError } from '../lib/errors.js';
import type { LogLevel } from '../lib/log.js';

dotenv.config();

const envSchema = z.object({
  PORTFOLIO_DATA_DIR: z.string().min(1).default('./data'),
  PORTFOLIO_APPLICATIONS_FILE: z.string().min(1).default('applications_expanded.csv'),
  PORTFOLIO_LMS_FILE: z.string().min(1).default('lms_updates_expanded.csv'),
  PORTFOLIO_OUTPUT_DIR: z.string().min(1).default('./output'),
  PORTFOLIO_WORK_DIR: z.string().min(1).default('./data/work'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export interface AppConfig {
  applicationsPath: string;
  lmsPath: string;
  outputDir: string;
  workDir: string;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new PipelineError(`Invalid configuration (${details})`, 'config', 'CONFIG_INVALID');
  }

  const parsed = result.data;
  const dataDir = path.resolve(parsed.PORTFOLIO_DATA_DIR);

  return {
    applicationsPath: path.resolve(dataDir, parsed.PORTFOLIO_APPLICATIONS_FILE),
    lmsPath: path.resolve(dataDir, parsed.PORTFOLIO_LMS_FILE),
    outputDir: path.resolve(parsed.PORTFOLIO_OUTPUT_DIR),
    workDir: path.resolve(parsed.PORTFOLIO_WORK_DIR),
    logLevel: parsed.LOG_LEVEL
  };
}
