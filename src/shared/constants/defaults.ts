export const APP_NAME = 'waste-sort-bridge'
export const APP_VERSION = '1.0.0'

export const STATS_FILE_NAME = 'waste_classification_stats.csv'
export const LOG_FILE_NAME = 'waste-sort-bridge.log'
export const LOG_MAX_FILE_SIZE = 10 * 1024 * 1024
