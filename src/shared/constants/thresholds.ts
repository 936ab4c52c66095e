// Decision aggregation
export const DECISION_WINDOW_SIZE = 10
export const CONSECUTIVE_MATCH_THRESHOLD = 2

// Classifier subprocess
export const CLASSIFIER_TIMEOUT = 30_000
export const CLASSIFIER_MAX_OUTPUT_BYTES = 1024 * 1024

// Cycle reset after a finalized decision (0 disables)
export const AUTO_RESET_DELAY = 3_000

// Inbox watching: a new file is submitted once its size has been stable this long
export const INBOX_STABILITY_THRESHOLD = 500
export const INBOX_POLL_INTERVAL = 100
export const INBOX_IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.bmp', '.webp'] as const

// Serial link
export const DEFAULT_BAUD_RATE = 9_600
export const SUPPORTED_BAUD_RATES = [9_600, 19_200, 38_400, 57_600, 115_200] as const
export const DEVICE_MAX_RECONNECT_ATTEMPTS = 3
export const DEVICE_RECONNECT_COOLDOWN = 5_000
export const DEVICE_RECONNECT_RESET_TIME = 60_000
