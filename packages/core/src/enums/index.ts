export { DecryptionErrorCode } from './decryption-error-code.js';
export { StoredKeypairErrorCode } from './stored-keypair-error-code.js';
