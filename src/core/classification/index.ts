export { createDecisionAggregator } from './decision-aggregator'
export type { DecisionAggregator, DecisionAggregatorOptions } from './decision-aggregator'
export { isCategory, resolveCategory, createEmptyTally } from './category-registry'
export { parseClassifierOutput } from './classifier-output'
export type { ImageClassifier, ClassifierConfig } from './classifier'
