import { createStore } from 'zustand/vanilla'
import type { AppStoreState } from '@shared/types/app-store'
import { createEmptyTally } from '@core/classification/category-registry'

// @DEV-GUIDE: AppStore is a Zustand vanilla store holding the operator-visible status of the
// bridge: classifier + serial device health, the current aggregation decision and tally, and
// pipeline counters. Services call appStore.setState() directly; index.ts subscribes and
// logs the transitions an operator cares about (device up/down, decisions).

export function createAppStore() {
  return createStore<AppStoreState>(() => ({
    classifierStatus: 'idle',
    classifierError: null,
    deviceStatus: 'disconnected',
    devicePort: null,
    deviceError: null,
    decision: { category: null, isFinalized: false },
    lastFinalized: null,
    tally: createEmptyTally(),
    pendingClassifications: 0,
    failedClassifications: 0,
  }))
}

export type AppStore = ReturnType<typeof createAppStore>
