// Classes
export { Ed25519Keypair } from './keypair.js';
export { SharedKeypair } from './shared-keypair.js';
export { StoredKeypair } from './stored-keypair.js';
export { DecryptionError, DeserializeStoredKeypairError } from './errors.js';

// Functions (envelope)
export {
	decrypt,
	deriveKey,
	encrypt,
	newSalt,
	open,
	seal,
	splitEnvelope,
} from './envelope.js';

// Constants
export { AEAD_OVERHEAD, ENVELOPE_LAYOUT, KDF_PARAMS, SALT_LENGTH } from './envelope.js';
export { KEYPAIR_LENGTH, PUBLIC_KEY_LENGTH, SECRET_KEY_LENGTH } from './keypair.js';
export { ENCRYPTED_KEY_PREFIX, UNENCRYPTED_KEY_PREFIX } from './stored-keypair.js';

// Types
export type { EnvelopeParts } from './envelope.js';
export type { KeypairGuard } from './shared-keypair.js';
export type { StoredKeypairValue } from './stored-keypair.js';
