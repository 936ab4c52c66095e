import { ALL_CATEGORIES } from '@shared/constants/categories'
import {
  CONSECUTIVE_MATCH_THRESHOLD,
  DECISION_WINDOW_SIZE,
} from '@shared/constants/thresholds'
import type {
  AggregationDecision,
  Category,
  CategoryTally,
  FinalizedDecision,
  FinalizedHandler,
  Observation,
} from '@shared/types'
import { createEmptyTally } from './category-registry'

// @DEV-GUIDE: Turns a noisy stream of per-frame labels into one stable decision per cycle.
//
// Every observe() appends to a FIFO window of the last N observations. Until the cycle is
// finalized, two predicates are checked in order:
//   1. consecutive: the last `consecutiveThreshold` observations are the same category
//   2. majority: the window is full and one category holds >= `majorityThreshold` slots
// Either one finalizes the cycle with the MOST RECENT observation's category, even when the
// majority category is a different one. Finalizing bumps the tally and notifies the handler.
// Later observations still enter the window but cannot change the decision until reset().
//
// The handler runs in a microtask, never inside observe(). Handler failures go to
// onHandlerError, and are dropped when none is given. The tally survives reset(); only the
// window and decision are cleared.

export interface DecisionAggregatorOptions {
  windowSize?: number
  consecutiveThreshold?: number
  /** Defaults to half the window size, rounded up (5 of 10) */
  majorityThreshold?: number
  initialTally?: Partial<CategoryTally>
  /** Receives errors thrown or rejected by the finalized handler */
  onHandlerError?: (error: unknown, decision: FinalizedDecision) => void
}

export interface DecisionAggregator {
  observe(category: Category): void
  reset(): void
  getTally(): CategoryTally
  getCurrentDecision(): AggregationDecision
  getWindow(): Observation[]
  setFinalizedHandler(handler: FinalizedHandler | null): void
}

export function createDecisionAggregator(
  options: DecisionAggregatorOptions = {},
): DecisionAggregator {
  const windowSize = Math.max(1, Math.floor(options.windowSize ?? DECISION_WINDOW_SIZE))
  const consecutiveThreshold = Math.max(
    2,
    Math.floor(options.consecutiveThreshold ?? CONSECUTIVE_MATCH_THRESHOLD),
  )
  const majorityThreshold = Math.max(
    1,
    Math.floor(options.majorityThreshold ?? Math.ceil(windowSize / 2)),
  )

  const tally = createEmptyTally()
  for (const category of ALL_CATEGORIES) {
    const count = options.initialTally?.[category]
    if (count !== undefined && Number.isInteger(count) && count > 0) {
      tally[category] = count
    }
  }
  const window: Observation[] = []
  let sequence = 0
  let currentCategory: Category | null = null
  let finalized = false
  let finalizedHandler: FinalizedHandler | null = null

  function hasConsecutiveMatch(): boolean {
    if (window.length < consecutiveThreshold) return false
    const last = window[window.length - 1].category
    for (let i = window.length - consecutiveThreshold; i < window.length - 1; i++) {
      if (window[i].category !== last) return false
    }
    return true
  }

  function hasWindowMajority(): boolean {
    if (window.length < windowSize) return false
    const frequency = new Map<Category, number>()
    for (const observation of window) {
      const count = (frequency.get(observation.category) ?? 0) + 1
      if (count >= majorityThreshold) return true
      frequency.set(observation.category, count)
    }
    return false
  }

  function dispatch(decision: FinalizedDecision): void {
    const handler = finalizedHandler
    if (!handler) return

    // Handler failures never propagate past the microtask
    const report = (error: unknown) => {
      options.onHandlerError?.(error, decision)
    }

    queueMicrotask(() => {
      try {
        const result = handler(decision)
        if (result instanceof Promise) result.catch(report)
      } catch (error) {
        report(error)
      }
    })
  }

  function finalize(observation: Observation): void {
    currentCategory = observation.category
    finalized = true
    tally[observation.category] += 1

    dispatch({
      category: observation.category,
      count: tally[observation.category],
      sequence: observation.sequence,
      finalizedAt: new Date(),
    })
  }

  function observe(category: Category): void {
    sequence += 1
    const observation: Observation = { category, sequence }
    window.push(observation)
    if (window.length > windowSize) {
      window.shift()
    }

    if (finalized) return

    if (hasConsecutiveMatch() || hasWindowMajority()) {
      finalize(observation)
    }
  }

  function reset(): void {
    window.length = 0
    currentCategory = null
    finalized = false
  }

  return {
    observe,
    reset,
    getTally: () => ({ ...tally }),
    getCurrentDecision: () => ({ category: currentCategory, isFinalized: finalized }),
    getWindow: () => window.map((observation) => ({ ...observation })),
    setFinalizedHandler: (handler) => {
      finalizedHandler = handler
    },
  }
}
