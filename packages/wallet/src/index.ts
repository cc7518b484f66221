export { LOG_THRESHOLDS, parseConfig } from './lib/config.js';
export { configureLogging, logLevelsFor } from './lib/logging.js';
export { KeyFile, validateAlias } from './lib/key-file.js';
export { JsonKeyFileStore } from './lib/key-file-store.js';
export { TerminalPasswordProvider } from './lib/prompt.js';

export type { KeysealConfig, LogThreshold } from './lib/config.js';
export type { FindOptions, InsertOptions } from './lib/key-file.js';
export type { KeyFileContents } from './lib/key-file-store.js';
