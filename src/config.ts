import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from './core/errors.js';

dotenv.config();

export const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

const booleanFlag = (fallback: boolean) =>
  z.string().optional().transform(value => {
    if (value === undefined || value === '') return fallback;
    return value.toLowerCase() !== 'false';
  });

export const ConfigSchema = z.object({
  SESSION_MODE: z.enum(['local', 'remote']).optional().default('local'),
  REMOTE_ENDPOINT: z.string().url().optional().default('http://127.0.0.1:9222'),
  HEADLESS: booleanFlag(true),
  JAVASCRIPT_ENABLED: booleanFlag(true),
  NAVIGATION_TIMEOUT: z.coerce.number().int().positive().optional().default(30000),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform(value => (value ?? 'INFO').toUpperCase())
    .pipe(z.enum(LOG_LEVEL_NAMES)),
  LOG_DIR: z.string().min(1).optional(),
});

export interface ExtractorConfig {
  sessionMode: 'local' | 'remote';
  remoteEndpoint: string;
  headless: boolean;
  javaScriptEnabled: boolean;
  navigationTimeout: number;
  logLevel: LogLevelName;
  logDir?: string;
}

/**
 * Reads the environment (after `.env` has been applied) into a validated config.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  const relevant = Object.fromEntries(
    Object.keys(ConfigSchema.shape)
      .map(key => [key, env[key]] as const)
      .filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = ConfigSchema.safeParse(relevant);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration (${problems.join('; ')})`, problems);
  }

  const values = parsed.data;
  return {
    sessionMode: values.SESSION_MODE,
    remoteEndpoint: values.REMOTE_ENDPOINT,
    headless: values.HEADLESS,
    javaScriptEnabled: values.JAVASCRIPT_ENABLED,
    navigationTimeout: values.NAVIGATION_TIMEOUT,
    logLevel: values.LOG_LEVEL,
    logDir: values.LOG_DIR,
  };
}
