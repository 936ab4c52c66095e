import { z } from 'zod'
import type { ClassificationOutcome } from '@shared/types'
import { resolveCategory } from './category-registry'

// @DEV-GUIDE: Parses the single JSON line the classifier script prints on stdout.
//   success: { success: true, category: "Glass", confidence: 0.97, all_predictions: [...] }
//   failure: { success: false, error: "Image not found: ..." }
// Anything else (usage text, truncated JSON, labels outside the registry) becomes a
// failure outcome so it never reaches the aggregator.

const predictionSchema = z.object({
  category: z.string(),
  confidence: z.number(),
})

const classifierOutputSchema = z.discriminatedUnion('success', [
  z.object({
    success: z.literal(true),
    category: z.string(),
    confidence: z.number().optional(),
    all_predictions: z.array(predictionSchema).optional(),
  }),
  z.object({
    success: z.literal(false),
    error: z.string().optional(),
  }),
])

export type ClassifierOutput = z.infer<typeof classifierOutputSchema>

export function parseClassifierOutput(stdout: string): ClassificationOutcome {
  const text = stdout.trim()
  if (text.length === 0) {
    return { success: false, error: 'No output from classifier' }
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch {
    return { success: false, error: `Malformed classifier output: ${truncate(text)}` }
  }

  const parsed = classifierOutputSchema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    return { success: false, error: `Invalid classifier output${where}: ${issue.message}` }
  }

  const output = parsed.data
  if (!output.success) {
    return { success: false, error: output.error ?? 'Unknown error' }
  }

  const category = resolveCategory(output.category)
  if (!category) {
    return { success: false, error: `Unrecognized category label: ${output.category}` }
  }

  return { success: true, category, confidence: output.confidence ?? null }
}

function truncate(text: string, max = 120): string {
  return text.length > max ? `${text.slice(0, max)}...` : text
}
