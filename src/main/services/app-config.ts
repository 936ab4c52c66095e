import { existsSync } from 'fs'
import { resolve } from 'path'
import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'
import log from 'electron-log/node'
import type { ClassifierConfig } from '@core/classification/classifier'
import {
  AUTO_RESET_DELAY,
  CLASSIFIER_TIMEOUT,
  DEFAULT_BAUD_RATE,
  INBOX_POLL_INTERVAL,
  INBOX_STABILITY_THRESHOLD,
  SUPPORTED_BAUD_RATES,
} from '@shared/constants/thresholds'

// @DEV-GUIDE: Runtime configuration comes from environment variables. In development a `.env`
// file in the working directory is loaded first via dotenv (existing variables win).
// The environment is validated with zod; relative paths resolve against the working directory.
//
// Optional features are switched off by leaving their variable empty:
//   STATS_DIR=""     -> no tally log (in-memory tally only)
//   SERIAL_PORT      -> unset means no device link, decisions are only logged
//   INBOX_DIR        -> unset means only images passed on the command line are classified

const logger = log.scope('config')

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly'

export interface AppConfig {
  classifier: ClassifierConfig
  minConfidence: number
  statsDirectory: string | null
  serial: { path: string; baudRate: number } | null
  autoResetDelayMs: number
  inbox: { directory: string; stabilityThresholdMs: number; pollIntervalMs: number } | null
  logDirectory: string
  logLevel: LogLevel
  sentryDsn: string | undefined
}

const BAUD_RATES: readonly number[] = SUPPORTED_BAUD_RATES

const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalText = z.preprocess(blankAsUndefined, z.string().trim().optional())

const requiredText = (name: string) =>
  z.preprocess(blankAsUndefined, z.string({ required_error: `${name} is required` }).trim())

const numberWithDefault = (schema: z.ZodType<number>, fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().pipe(schema).default(fallback))

const envSchema = z.object({
  PYTHON_EXECUTABLE: z.preprocess(blankAsUndefined, z.string().trim().default('python3')),
  CLASSIFIER_SCRIPT: requiredText('CLASSIFIER_SCRIPT'),
  CLASSIFIER_MODEL: requiredText('CLASSIFIER_MODEL'),
  CLASSIFIER_TIMEOUT_MS: numberWithDefault(z.number().int().positive(), CLASSIFIER_TIMEOUT),
  CLASSIFIER_MIN_CONFIDENCE: numberWithDefault(z.number().min(0).max(1), 0),
  STATS_DIR: z.string().trim().default('./stats'),
  SERIAL_PORT: optionalText,
  SERIAL_BAUD_RATE: numberWithDefault(
    z.number().int().refine((rate) => BAUD_RATES.includes(rate), {
      message: `must be one of ${BAUD_RATES.join(', ')}`,
    }),
    DEFAULT_BAUD_RATE,
  ),
  AUTO_RESET_DELAY_MS: numberWithDefault(z.number().int().min(0), AUTO_RESET_DELAY),
  INBOX_DIR: optionalText,
  INBOX_STABILITY_MS: numberWithDefault(z.number().int().positive(), INBOX_STABILITY_THRESHOLD),
  INBOX_POLL_INTERVAL_MS: numberWithDefault(z.number().int().positive(), INBOX_POLL_INTERVAL),
  LOG_DIR: z.preprocess(blankAsUndefined, z.string().trim().default('./logs')),
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('info'),
  ),
  SENTRY_DSN: optionalText,
})

/**
 * Load `.env` from `cwd` into process.env when the file exists.
 * Returns true when a file was loaded.
 */
export function loadEnvFile(cwd: string = process.cwd()): boolean {
  const envPath = resolve(cwd, '.env')
  if (!existsSync(envPath)) return false

  const result = loadDotenv({ path: envPath })
  if (result.error) {
    logger.warn('Failed to load .env file', { path: envPath, error: result.error.message })
    return false
  }
  return true
}

/**
 * Validate the environment and build the application config.
 * Throws with every problem listed when the environment is invalid.
 */
export function loadAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.message.startsWith(String(issue.path[0]))
        ? issue.message
        : `${issue.path.join('.')} ${issue.message}`,
    )
    throw new Error(`Invalid configuration: ${problems.join('; ')}`)
  }

  const vars = parsed.data
  const config: AppConfig = {
    classifier: {
      pythonExecutable: vars.PYTHON_EXECUTABLE,
      scriptPath: resolve(cwd, vars.CLASSIFIER_SCRIPT),
      modelPath: resolve(cwd, vars.CLASSIFIER_MODEL),
      timeoutMs: vars.CLASSIFIER_TIMEOUT_MS,
    },
    minConfidence: vars.CLASSIFIER_MIN_CONFIDENCE,
    statsDirectory: vars.STATS_DIR ? resolve(cwd, vars.STATS_DIR) : null,
    serial: vars.SERIAL_PORT
      ? { path: vars.SERIAL_PORT, baudRate: vars.SERIAL_BAUD_RATE }
      : null,
    autoResetDelayMs: vars.AUTO_RESET_DELAY_MS,
    inbox: vars.INBOX_DIR
      ? {
          directory: resolve(cwd, vars.INBOX_DIR),
          stabilityThresholdMs: vars.INBOX_STABILITY_MS,
          pollIntervalMs: vars.INBOX_POLL_INTERVAL_MS,
        }
      : null,
    logDirectory: resolve(cwd, vars.LOG_DIR),
    logLevel: vars.LOG_LEVEL,
    sentryDsn: vars.SENTRY_DSN,
  }

  logger.info('Configuration loaded', {
    statsDirectory: config.statsDirectory ?? 'DISABLED',
    serialPort: config.serial?.path ?? 'DISABLED',
    inbox: config.inbox?.directory ?? 'DISABLED',
  })
  return config
}
