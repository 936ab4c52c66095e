import { extname } from 'path'
import { watch, type FSWatcher } from 'chokidar'
import log from 'electron-log/node'
import {
  INBOX_IMAGE_EXTENSIONS,
  INBOX_POLL_INTERVAL,
  INBOX_STABILITY_THRESHOLD,
} from '@shared/constants/thresholds'

// @DEV-GUIDE: Feeds images dropped into a directory (e.g. by the camera capture tool) into the
// classification pipeline, using a chokidar watcher on the top level of the directory.
//
// New files are only reported once their size has stopped changing for stabilityThresholdMs
// (chokidar awaitWriteFinish), so a frame the capture tool is still writing is never handed
// to the classifier half-written. Images already in the directory at startup are collected
// until the watcher is ready and submitted as one batch in file-name order, which matches
// capture order for timestamped names. Later files are submitted as they settle.
//
// Files are left in place. A file removed and dropped back in is submitted again.

const logger = log.scope('inbox')

const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set(INBOX_IMAGE_EXTENSIONS)

export interface InboxOptions {
  stabilityThresholdMs?: number
  pollIntervalMs?: number
}

export interface InboxService {
  /** Start watching; resolves with the images found at startup, in submission order */
  startWatching(): Promise<string[]>
  stopWatching(): Promise<void>
  isWatching(): boolean
}

function isImage(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(filePath).toLowerCase())
}

export function createInboxService(
  directory: string,
  submit: (imagePath: string) => Promise<void>,
  options: InboxOptions = {},
): InboxService {
  const stabilityThreshold = options.stabilityThresholdMs ?? INBOX_STABILITY_THRESHOLD
  const pollInterval = options.pollIntervalMs ?? INBOX_POLL_INTERVAL
  let watcher: FSWatcher | null = null
  let finishStart: ((batch: string[]) => void) | null = null

  function submitImage(imagePath: string): void {
    logger.debug('Image queued', { image: imagePath })
    submit(imagePath).catch((err: unknown) => {
      logger.error('Failed to submit image', {
        image: imagePath,
        error: err instanceof Error ? err.message : String(err),
      })
    })
  }

  function startWatching(): Promise<string[]> {
    if (watcher) {
      logger.warn('Inbox already watched', { directory })
      return Promise.resolve([])
    }

    const current = watch(directory, {
      persistent: true,
      ignoreInitial: false,
      depth: 0,
      awaitWriteFinish: { stabilityThreshold, pollInterval },
    })
    watcher = current

    let ready = false
    const initial: string[] = []

    current
      .on('add', (filePath: string) => {
        if (watcher !== current || !isImage(filePath)) return
        if (!ready) {
          initial.push(filePath)
          return
        }
        submitImage(filePath)
      })
      .on('error', (error: unknown) => {
        logger.warn('Inbox watcher error', {
          directory,
          error: error instanceof Error ? error.message : String(error),
        })
      })

    return new Promise<string[]>((resolve) => {
      finishStart = resolve
      current.once('ready', () => {
        ready = true
        finishStart = null
        if (watcher !== current) {
          resolve([])
          return
        }
        const batch = [...initial].sort()
        for (const imagePath of batch) submitImage(imagePath)
        logger.info('Watching inbox', { directory, initial: batch.length, stabilityThreshold })
        resolve(batch)
      })
    })
  }

  async function stopWatching(): Promise<void> {
    const current = watcher
    if (!current) return
    watcher = null
    // Stopped before the initial scan finished
    finishStart?.([])
    finishStart = null
    await current.close()
    logger.debug('Stopped watching inbox', { directory })
  }

  return { startWatching, stopWatching, isWatching: () => watcher !== null }
}
