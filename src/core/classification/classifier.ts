import type { ClassificationOutcome } from '@shared/types'

export interface ClassifierConfig {
  pythonExecutable: string
  scriptPath: string
  modelPath: string
  timeoutMs: number
}

/**
 * Produces one label per image. Classification failures resolve to a failure outcome;
 * the returned promise does not reject for them.
 */
export interface ImageClassifier {
  classify(imagePath: string): Promise<ClassificationOutcome>
}
