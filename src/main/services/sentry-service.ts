import * as Sentry from '@sentry/node'
import log from 'electron-log/node'
import { APP_NAME, APP_VERSION } from '@shared/constants/defaults'

// @DEV-GUIDE: Crash and incident reporting for unattended sorter stations.
// Exceptions (uncaught errors, failing decision handlers) go through captureException;
// operational incidents that are not exceptions (serial link given up, classifier unusable)
// go through captureWarning so they show up as warning-level events.
//
// Without SENTRY_DSN the returned service is a no-op, so callers never branch on it.
// flush() is awaited during shutdown before the process exits.

const logger = log.scope('sentry')

export interface SentryService {
  isEnabled(): boolean
  captureException(error: Error, context?: Record<string, unknown>): void
  captureWarning(message: string, context?: Record<string, unknown>): void
  addBreadcrumb(message: string, category?: string, data?: Record<string, unknown>): void
  flush(timeoutMs?: number): Promise<void>
}

const noopService: SentryService = {
  isEnabled: () => false,
  captureException: () => {},
  captureWarning: () => {},
  addBreadcrumb: () => {},
  flush: async () => {},
}

export function createSentryService(dsn: string | undefined): SentryService {
  if (!dsn) {
    logger.info('Sentry DSN not configured, crash reporting disabled')
    return noopService
  }

  try {
    Sentry.init({
      dsn,
      environment: process.env.NODE_ENV === 'production' ? 'production' : 'development',
      release: `${APP_NAME}@${APP_VERSION}`,
      initialScope: { tags: { component: APP_NAME } },
    })
    logger.info('Sentry initialized', { release: `${APP_NAME}@${APP_VERSION}` })
  } catch (err) {
    logger.warn('Failed to initialize Sentry', { error: String(err) })
    return noopService
  }

  return {
    isEnabled: () => true,
    captureException: (error, context) => {
      Sentry.captureException(error, { extra: context })
    },
    captureWarning: (message, context) => {
      Sentry.captureMessage(message, { level: 'warning', extra: context })
    },
    addBreadcrumb: (message, category = 'bridge', data) => {
      Sentry.addBreadcrumb({ message, category, data, level: 'info' })
    },
    flush: async (timeoutMs = 2_000) => {
      const drained = await Sentry.flush(timeoutMs)
      if (!drained) logger.warn('Sentry events still queued at shutdown', { timeoutMs })
    },
  }
}
