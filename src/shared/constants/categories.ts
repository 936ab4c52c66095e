// Ordered waste categories the classifier model is trained on. The order matches the
// model's output vector and the device codes 0x01..0x05.
export const WASTE_CATEGORIES = ['Paper', 'Glass', 'Metal', 'Plastic', 'Trash'] as const
export type WasteCategory = (typeof WASTE_CATEGORIES)[number]

/** Observed when the classifier is not confident enough to name a waste category. */
export const UNRECOGNIZED_CATEGORY = 'Unknown' as const

export const ALL_CATEGORIES = [...WASTE_CATEGORIES, UNRECOGNIZED_CATEGORY] as const
export type Category = (typeof ALL_CATEGORIES)[number]
