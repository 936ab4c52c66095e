import { join } from 'path'
import log from 'electron-log/node'
import { createDecisionAggregator } from '@core/classification'
import { LOG_FILE_NAME, LOG_MAX_FILE_SIZE, APP_NAME, APP_VERSION } from '@shared/constants/defaults'
import { loadAppConfig, loadEnvFile, type AppConfig } from './services/app-config'
import { createSentryService, type SentryService } from './services/sentry-service'
import { createClassifierService } from './services/classifier-service'
import { createTallyLogService } from './services/tally-log-service'
import { createDeviceLinkService, type DeviceLinkService } from './services/device-link-service'
import { createResultSink } from './services/result-sink'
import { createClassificationService } from './services/classification-service'
import { createInboxService, type InboxService } from './services/inbox-service'
import { createAppStore } from './store/app-store'

// @DEV-GUIDE: Process entry point (`npm start -- [image ...]`).
// Startup sequence: .env + config → logging → error handlers → Sentry → tally log (restores
// the tally) → aggregator → classifier (fatal if script/model missing) → serial link
// (non-fatal, decisions are still logged) → result sink → classification pipeline →
// command-line images → inbox watching.
//
// With no INBOX_DIR the process classifies the command-line images, waits for the decisions
// to be delivered and exits. With an inbox it runs until SIGINT/SIGTERM.
//
// Services use factory functions (createXxxService) returning interfaces; this file is the
// only place that knows how they are wired together.

log.transports.console.level = 'info'
log.transports.file.level = false

const logger = log.scope('main')

let sentryRef: SentryService | null = null

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack })
  sentryRef?.captureException(error, { context: 'uncaughtException' })
})

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason))
  logger.error('Unhandled rejection', { message: error.message, stack: error.stack })
  sentryRef?.captureException(error, { context: 'unhandledRejection' })
})

function configureLogging(config: AppConfig): void {
  log.transports.file.resolvePathFn = () => join(config.logDirectory, LOG_FILE_NAME)
  log.transports.file.level = 'info'
  log.transports.file.maxSize = LOG_MAX_FILE_SIZE
  log.transports.console.level = config.logLevel
}

async function main(): Promise<void> {
  loadEnvFile()

  let config: AppConfig
  try {
    config = loadAppConfig()
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error))
    process.exitCode = 1
    return
  }

  configureLogging(config)
  logger.info(`=== ${APP_NAME} v${APP_VERSION} starting ===`)
  logger.info(`Platform: ${process.platform} ${process.arch}, Node ${process.versions.node}`)

  const sentryService = createSentryService(config.sentryDsn)
  sentryRef = sentryService

  const appStore = createAppStore()
  appStore.subscribe((state, prev) => {
    if (state.deviceStatus !== prev.deviceStatus) {
      logger.info('Device status changed', {
        from: prev.deviceStatus,
        to: state.deviceStatus,
        error: state.deviceError,
      })
    }
    if (state.classifierStatus !== prev.classifierStatus) {
      logger.info('Classifier status changed', {
        from: prev.classifierStatus,
        to: state.classifierStatus,
        error: state.classifierError,
      })
    }
  })

  const tallyLog = createTallyLogService(config.statsDirectory)
  const initialTally = await tallyLog.initialize()
  sentryService.addBreadcrumb('Tally log initialized', 'stats')

  const aggregator = createDecisionAggregator({
    initialTally,
    onHandlerError: (error, decision) => {
      const err = error instanceof Error ? error : new Error(String(error))
      logger.error('Finalized handler failed', { category: decision.category, error: err.message })
      sentryService.captureException(err, { category: decision.category })
    },
  })
  appStore.setState({ tally: aggregator.getTally() })

  const classifier = createClassifierService(config.classifier)
  appStore.setState({ classifierStatus: 'initializing', classifierError: null })
  try {
    await classifier.initialize()
    appStore.setState({ classifierStatus: 'ready' })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    appStore.setState({ classifierStatus: 'error', classifierError: message })
    logger.error('Classifier setup failed', { error: message })
    sentryService.captureWarning('Classifier setup failed', { error: message })
    await sentryService.flush()
    process.exitCode = 1
    return
  }

  // @DEV-GUIDE: A device that is missing at startup is not fatal. Decisions are still logged,
  // and sends resolve to false until the link is up.
  let deviceLink: DeviceLinkService | null = null
  if (config.serial) {
    const serial = config.serial
    deviceLink = createDeviceLinkService(
      {
        ...serial,
        onLinkLost: (attempts) => {
          sentryService.captureWarning('Serial link given up', { port: serial.path, attempts })
        },
      },
      appStore,
    )
    deviceLink.onData((bytes) => {
      logger.debug('Device says', { text: bytes.toString('utf-8').trim() })
    })
    try {
      await deviceLink.connect()
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      logger.warn('Continuing without device link', { error: message })
      sentryService.captureWarning('Device link unavailable at startup', {
        port: serial.path,
        error: message,
      })
    }
  } else {
    logger.info('SERIAL_PORT not configured, decisions will only be logged')
  }

  const sink = createResultSink(tallyLog, deviceLink)
  const classification = createClassificationService(classifier, aggregator, sink, appStore, {
    minConfidence: config.minConfidence,
    autoResetDelayMs: config.autoResetDelayMs,
  })

  let inbox: InboxService | null = null
  let shuttingDown = false

  async function shutdown(reason: string): Promise<void> {
    if (shuttingDown) return
    shuttingDown = true
    logger.info('Shutting down', { reason })

    await inbox?.stopWatching()
    await classification.drain()
    classification.dispose()
    classifier.terminate()
    await sink.flush()
    await deviceLink?.disconnect()
    await sentryService.flush()

    logger.info('Final tally', aggregator.getTally())
  }

  process.on('SIGINT', () => {
    shutdown('SIGINT')
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: String(error) })
        process.exitCode = 1
      })
      .finally(() => process.exit())
  })
  process.on('SIGTERM', () => {
    shutdown('SIGTERM')
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: String(error) })
        process.exitCode = 1
      })
      .finally(() => process.exit())
  })

  const cliImages = process.argv.slice(2)
  for (const imagePath of cliImages) {
    classification.submit(imagePath).catch((error: unknown) => {
      logger.error('Failed to submit image', { image: imagePath, error: String(error) })
    })
  }

  if (config.inbox) {
    inbox = createInboxService(config.inbox.directory, classification.submit, {
      stabilityThresholdMs: config.inbox.stabilityThresholdMs,
      pollIntervalMs: config.inbox.pollIntervalMs,
    })
    const initial = await inbox.startWatching()
    logger.info('Inbox watched', { directory: config.inbox.directory, queued: initial.length })
    sentryService.addBreadcrumb('Inbox watching started', 'lifecycle')
    logger.info('Bridge ready')
    return
  }

  if (cliImages.length === 0) {
    logger.warn('Nothing to classify: pass image paths or set INBOX_DIR')
  }
  await shutdown('input exhausted')
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error))
  logger.error('Fatal startup error', { error: err.message, stack: err.stack })
  sentryRef?.captureException(err, { context: 'startup' })
  process.exitCode = 1
})
