import { ALL_CATEGORIES } from '@shared/constants/categories'
import type { Category, CategoryTally } from '@shared/types'

const CATEGORY_SET: ReadonlySet<string> = new Set(ALL_CATEGORIES)

/** Exact, case-sensitive membership test against the closed category registry. */
export function isCategory(label: string): label is Category {
  return CATEGORY_SET.has(label)
}

export function resolveCategory(label: string): Category | null {
  return isCategory(label) ? label : null
}

export function createEmptyTally(): CategoryTally {
  return {
    Paper: 0,
    Glass: 0,
    Metal: 0,
    Plastic: 0,
    Trash: 0,
    Unknown: 0,
  }
}
