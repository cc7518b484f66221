import { DecryptionErrorCode, StoredKeypairErrorCode } from '@keyseal/core';

const DECRYPTION_MESSAGES: Record<DecryptionErrorCode, string> = {
	[DecryptionErrorCode.BAD_SALT]: 'Unexpected encryption salt',
	[DecryptionErrorCode.DECRYPTION]: 'Unable to decrypt the keypair. Is the password correct?',
	[DecryptionErrorCode.DESERIALIZING]: 'Unable to deserialize the keypair',
	[DecryptionErrorCode.NOT_DECRYPTING]: 'Asked not to decrypt',
};

/**
 * Unwrapping an encrypted keypair failed. `DECRYPTION` covers both a wrong
 * password and a corrupted envelope; callers should re-prompt.
 */
export class DecryptionError extends Error {
	constructor(public readonly code: DecryptionErrorCode) {
		super(DECRYPTION_MESSAGES[code]);
		this.name = 'DecryptionError';
	}
}

/** A persisted stored-keypair string could not be decoded. */
export class DeserializeStoredKeypairError extends Error {
	constructor(
		public readonly code: StoredKeypairErrorCode,
		public readonly detail?: string,
	) {
		super(
			code === StoredKeypairErrorCode.MISSING_PREFIX
				? 'The stored keypair is missing a prefix'
				: `The stored keypair is not valid: ${detail ?? 'unknown error'}`,
		);
		this.name = 'DeserializeStoredKeypairError';
	}
}
