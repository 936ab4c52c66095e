import { spawn, type ChildProcess } from 'child_process'
import { existsSync } from 'fs'
import log from 'electron-log/node'
import type { ClassifierConfig, ImageClassifier } from '@core/classification/classifier'
import { parseClassifierOutput } from '@core/classification/classifier-output'
import type { ClassificationOutcome } from '@shared/types'
import { CLASSIFIER_MAX_OUTPUT_BYTES } from '@shared/constants/thresholds'

// @DEV-GUIDE: Runs the external image classifier once per image:
//   <pythonExecutable> <scriptPath> <modelPath> <imagePath>
// The script loads the model, predicts, and prints one JSON line on stdout (see
// classifier-output.ts for the format). Each call is an independent process, so several
// classifications can be in flight; ordering is restored by ClassificationService.
//
// Failure handling: classify() never rejects. Spawn errors, non-zero exits, blank or malformed
// output and the watchdog timeout all resolve to { success: false, error } so the caller can
// log them and move on. The watchdog SIGKILLs the process after config.timeoutMs.
//
// initialize() only validates that the script and model exist; it throws when they don't,
// because nothing can be classified without them.

const logger = log.scope('classifier')

export interface ClassifierService extends ImageClassifier {
  initialize(): Promise<void>
  isReady(): boolean
  /** Kill every running classifier process */
  terminate(): void
}

export function createClassifierService(config: ClassifierConfig): ClassifierService {
  let ready = false
  const running = new Set<ChildProcess>()

  async function initialize(): Promise<void> {
    if (!existsSync(config.scriptPath)) {
      throw new Error(`Classifier script not found: ${config.scriptPath}`)
    }
    if (!existsSync(config.modelPath)) {
      throw new Error(`Model file not found: ${config.modelPath}`)
    }
    ready = true
    logger.info('Classifier ready', {
      executable: config.pythonExecutable,
      script: config.scriptPath,
      model: config.modelPath,
    })
  }

  function classify(imagePath: string): Promise<ClassificationOutcome> {
    if (!ready) {
      return Promise.resolve({ success: false, error: 'Classifier not initialized' })
    }

    return new Promise<ClassificationOutcome>((resolve) => {
      const start = performance.now()
      // Decoded once on close so multi-byte characters split across chunks survive
      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      let outputBytes = 0
      let settled = false

      const child = spawn(
        config.pythonExecutable,
        [config.scriptPath, config.modelPath, imagePath],
        { stdio: ['ignore', 'pipe', 'pipe'] },
      )
      running.add(child)

      function settle(outcome: ClassificationOutcome): void {
        if (settled) return
        settled = true
        clearTimeout(timer)
        running.delete(child)

        const durationMs = Math.round(performance.now() - start)
        if (outcome.success) {
          logger.debug('Image classified', {
            image: imagePath,
            category: outcome.category,
            confidence: outcome.confidence,
            durationMs,
          })
        } else {
          logger.warn('Classification failed', { image: imagePath, error: outcome.error, durationMs })
        }
        resolve(outcome)
      }

      // Watchdog
      const timer = setTimeout(() => {
        child.kill('SIGKILL')
        settle({
          success: false,
          error: `Classifier timed out after ${config.timeoutMs}ms`,
        })
      }, config.timeoutMs)

      child.stdout?.on('data', (chunk: Buffer | string) => {
        const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk
        outputBytes += bytes.length
        if (outputBytes > CLASSIFIER_MAX_OUTPUT_BYTES) {
          child.kill('SIGKILL')
          settle({ success: false, error: 'Classifier output exceeded size limit' })
          return
        }
        stdoutChunks.push(bytes)
      })

      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderrChunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk)
      })

      child.on('error', (err: Error) => {
        settle({ success: false, error: `Error running classifier: ${err.message}` })
      })

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code !== 0) {
          const reason = code === null ? `signal ${signal ?? 'unknown'}` : `code ${code}`
          const detail = Buffer.concat(stderrChunks).toString('utf8').trim()
          settle({
            success: false,
            error: detail
              ? `Classifier exited with ${reason}: ${detail}`
              : `Classifier exited with ${reason}`,
          })
          return
        }
        settle(parseClassifierOutput(Buffer.concat(stdoutChunks).toString('utf8')))
      })
    })
  }

  function terminate(): void {
    for (const child of running) {
      child.kill('SIGKILL')
    }
    if (running.size > 0) {
      logger.info('Killed running classifier processes', { count: running.size })
    }
    running.clear()
    ready = false
  }

  return {
    initialize,
    classify,
    terminate,
    isReady: () => ready,
  }
}
