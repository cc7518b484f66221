export { DecryptionErrorCode, StoredKeypairErrorCode } from './enums/index.js';
export type { IKeypairStore, IPasswordProvider } from './interfaces/index.js';
export type { EnvelopeLayout, KdfParams } from './types/index.js';
