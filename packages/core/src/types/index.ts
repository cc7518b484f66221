export type { EnvelopeLayout } from './envelope-layout.js';
export type { KdfParams } from './kdf-params.js';
