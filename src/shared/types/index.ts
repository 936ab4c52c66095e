import type { Category } from '../constants/categories'

export type { Category, WasteCategory } from '../constants/categories'

// --- Decision aggregation ---

/** Cumulative number of finalized decisions per category. Always holds every category. */
export type CategoryTally = Record<Category, number>

/** A single classification event. `sequence` is the arrival order, starting at 1. */
export interface Observation {
  category: Category
  sequence: number
}

export interface AggregationDecision {
  category: Category | null
  isFinalized: boolean
}

/** Emitted once per aggregation cycle when the decision becomes stable. */
export interface FinalizedDecision {
  category: Category
  /** Tally for `category` including this decision */
  count: number
  /** Sequence of the observation that triggered finalization */
  sequence: number
  finalizedAt: Date
}

export type FinalizedHandler = (decision: FinalizedDecision) => void | Promise<void>

// --- Classification ---

export interface ClassificationSuccess {
  success: true
  category: Category
  confidence: number | null
}

export interface ClassificationFailure {
  success: false
  error: string
}

export type ClassificationOutcome = ClassificationSuccess | ClassificationFailure
