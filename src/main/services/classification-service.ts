import log from 'electron-log/node'
import type { DecisionAggregator, ImageClassifier } from '@core/classification'
import { UNRECOGNIZED_CATEGORY } from '@shared/constants/categories'
import type { Category, ClassificationOutcome, ClassificationSuccess, FinalizedDecision } from '@shared/types'
import type { AppStore } from '../store/app-store'
import type { ResultSink } from './result-sink'

// @DEV-GUIDE: The caller side of the DecisionAggregator. submit() starts classification right
// away (several classifier processes may run at once) but results are delivered to
// aggregator.observe() strictly in submission order through a single promise chain, so the
// window always reflects the order images were taken, not the order processes finished.
//
// Failed classifications are logged and counted; they never reach the aggregator, the cycle
// just does not advance for that image. A confidence below minConfidence is observed as the
// Unknown sentinel rather than the reported label.
//
// Finalized decisions go to the ResultSink fire-and-forget. With autoResetDelayMs > 0 the
// cycle resets that long after each decision, ready for the next item on the belt.

const logger = log.scope('classification')

export interface ClassificationServiceOptions {
  /** 0 disables the confidence gate */
  minConfidence?: number
  /** 0 disables automatic reset; reset() must then be called explicitly */
  autoResetDelayMs?: number
}

export interface ClassificationService {
  submit(imagePath: string): Promise<void>
  /** Resolves once every image submitted so far has been delivered or skipped */
  drain(): Promise<void>
  reset(): void
  dispose(): void
}

export function createClassificationService(
  classifier: ImageClassifier,
  aggregator: DecisionAggregator,
  sink: ResultSink,
  appStore: AppStore,
  options: ClassificationServiceOptions = {},
): ClassificationService {
  const minConfidence = options.minConfidence ?? 0
  const autoResetDelayMs = options.autoResetDelayMs ?? 0

  let delivery: Promise<void> = Promise.resolve()
  let resetTimer: ReturnType<typeof setTimeout> | null = null
  let disposed = false

  aggregator.setFinalizedHandler(handleFinalized)

  function syncStore(): void {
    appStore.setState({
      decision: aggregator.getCurrentDecision(),
      tally: aggregator.getTally(),
    })
  }

  function handleFinalized(decision: FinalizedDecision): void {
    logger.info('Classification finalized', {
      category: decision.category,
      count: decision.count,
      sequence: decision.sequence,
    })
    appStore.setState({ lastFinalized: decision })
    syncStore()

    sink.handle(decision).catch((err: unknown) => {
      logger.error('Result sink failed', {
        category: decision.category,
        error: err instanceof Error ? err.message : String(err),
      })
    })

    scheduleAutoReset()
  }

  function scheduleAutoReset(): void {
    if (autoResetDelayMs <= 0 || disposed) return
    if (resetTimer) clearTimeout(resetTimer)
    resetTimer = setTimeout(() => {
      resetTimer = null
      reset()
    }, autoResetDelayMs)
  }

  function gate(result: ClassificationSuccess): Category {
    if (
      minConfidence > 0 &&
      result.confidence !== null &&
      result.confidence < minConfidence
    ) {
      return UNRECOGNIZED_CATEGORY
    }
    return result.category
  }

  function deliver(imagePath: string, outcome: ClassificationOutcome): void {
    appStore.setState((state) => ({
      pendingClassifications: Math.max(0, state.pendingClassifications - 1),
    }))

    if (disposed) return

    if (!outcome.success) {
      appStore.setState((state) => ({
        failedClassifications: state.failedClassifications + 1,
      }))
      logger.warn('Skipping image, classification failed', { image: imagePath, error: outcome.error })
      return
    }

    const category = gate(outcome)
    aggregator.observe(category)
    syncStore()
    logger.debug('Observation recorded', {
      image: imagePath,
      category,
      reported: outcome.category,
      confidence: outcome.confidence,
    })
  }

  function submit(imagePath: string): Promise<void> {
    if (disposed) {
      logger.warn('Classification service disposed, ignoring image', { image: imagePath })
      return Promise.resolve()
    }

    appStore.setState((state) => ({
      pendingClassifications: state.pendingClassifications + 1,
    }))

    const outcome: Promise<ClassificationOutcome> = classifier
      .classify(imagePath)
      .catch((err: unknown): ClassificationOutcome => ({
        success: false,
        error: err instanceof Error ? err.message : String(err),
      }))

    const delivered = delivery.then(async () => {
      deliver(imagePath, await outcome)
    })
    delivery = delivered
    return delivered
  }

  function reset(): void {
    if (resetTimer) {
      clearTimeout(resetTimer)
      resetTimer = null
    }
    aggregator.reset()
    syncStore()
    logger.info('Aggregation cycle reset')
  }

  function dispose(): void {
    disposed = true
    if (resetTimer) {
      clearTimeout(resetTimer)
      resetTimer = null
    }
    aggregator.setFinalizedHandler(null)
  }

  return { submit, drain: () => delivery, reset, dispose }
}
