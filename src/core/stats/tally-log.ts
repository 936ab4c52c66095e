import type { Category, CategoryTally } from '@shared/types'
import { createEmptyTally, resolveCategory } from '../classification/category-registry'

// @DEV-GUIDE: Append-only CSV format of finalized decisions:
//   Timestamp,Category,Count
//   2026-03-14 09:26:53,Glass,4
// The Count column is the cumulative count at write time, but it is informational only.
// deriveTally() rebuilds the tally by counting rows per category and never reads it, so a
// hand-edited or truncated log still produces a consistent tally.

export const TALLY_LOG_HEADER = 'Timestamp,Category,Count'

/** Local time as `yyyy-MM-dd HH:mm:ss`. */
export function formatLogTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0')
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

export function formatTallyRow(at: Date, category: Category, count: number): string {
  return `${formatLogTimestamp(at)},${category},${count}`
}

export function deriveTally(content: string): CategoryTally {
  const tally = createEmptyTally()
  const lines = content.split(/\r?\n/)

  // First line is the header
  for (let i = 1; i < lines.length; i++) {
    // Trailing empty fields do not count towards the three required columns
    const parts = lines[i].replace(/,+$/, '').split(',')
    if (parts.length < 3) continue

    const category = resolveCategory(parts[1])
    if (category) {
      tally[category] += 1
    }
  }

  return tally
}
