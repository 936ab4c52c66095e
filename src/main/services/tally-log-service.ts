import { appendFile, mkdir, readFile, writeFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import log from 'electron-log/node'
import { createEmptyTally } from '@core/classification/category-registry'
import { TALLY_LOG_HEADER, deriveTally, formatTallyRow } from '@core/stats/tally-log'
import type { CategoryTally, FinalizedDecision } from '@shared/types'
import { STATS_FILE_NAME } from '@shared/constants/defaults'

// @DEV-GUIDE: Durable record of finalized decisions in <statsDirectory>/waste_classification_stats.csv.
// initialize() creates the directory, then either re-derives the tally from an existing log
// (row counting, see core/stats/tally-log.ts) or starts a new file with the CSV header.
//
// Persistence failures are logged and never thrown: the sorter keeps running with its
// in-memory tally. Appends are chained so rows land in the order decisions were made.
// A null directory disables persistence entirely.

const logger = log.scope('tally-log')

export interface TallyLogService {
  initialize(): Promise<CategoryTally>
  append(decision: FinalizedDecision): Promise<boolean>
  getLogPath(): string | null
}

export function createTallyLogService(statsDirectory: string | null): TallyLogService {
  const logPath = statsDirectory ? join(statsDirectory, STATS_FILE_NAME) : null
  let writeQueue: Promise<unknown> = Promise.resolve()

  async function initialize(): Promise<CategoryTally> {
    if (!statsDirectory || !logPath) {
      logger.info('Stats directory not configured, tally log disabled')
      return createEmptyTally()
    }

    try {
      await mkdir(statsDirectory, { recursive: true })

      if (existsSync(logPath)) {
        const content = await readFile(logPath, 'utf-8')
        const tally = deriveTally(content)
        logger.info('Tally restored from log', { path: logPath, tally })
        return tally
      }

      await writeFile(logPath, `${TALLY_LOG_HEADER}\n`, 'utf-8')
      logger.info('Created tally log', { path: logPath })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      logger.error('Failed to initialize tally log', { path: logPath, error: message })
    }
    return createEmptyTally()
  }

  function append(decision: FinalizedDecision): Promise<boolean> {
    if (!logPath) return Promise.resolve(false)

    const row = formatTallyRow(decision.finalizedAt, decision.category, decision.count)
    const write = writeQueue.then(async () => {
      try {
        await appendFile(logPath, `${row}\n`, 'utf-8')
        return true
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        logger.error('Failed to save stats', { path: logPath, error: message })
        return false
      }
    })
    writeQueue = write
    return write
  }

  return {
    initialize,
    append,
    getLogPath: () => logPath,
  }
}
