import type { AggregationDecision, CategoryTally, FinalizedDecision } from './index'

// @DEV-GUIDE: AppStore state shape. Operator-visible status of the sorting bridge, written
// by the services in src/main and read by the status logger in index.ts. The aggregator
// owns the real decision state; the store only mirrors it after every change.

export interface AppStoreState {
  // Classifier subprocess
  classifierStatus: 'idle' | 'initializing' | 'ready' | 'error'
  classifierError: string | null

  // Serial device
  deviceStatus: 'disconnected' | 'connecting' | 'connected' | 'error'
  devicePort: string | null
  deviceError: string | null

  // Aggregation cycle
  decision: AggregationDecision
  lastFinalized: FinalizedDecision | null
  tally: CategoryTally

  // Classification pipeline
  pendingClassifications: number
  failedClassifications: number
}
