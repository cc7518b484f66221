import {
	DecryptionErrorCode,
	type IPasswordProvider,
	StoredKeypairErrorCode,
} from '@keyseal/core';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { Logger } from '@nestjs/common';
import { decrypt, encrypt } from './envelope.js';
import { DecryptionError, DeserializeStoredKeypairError } from './errors.js';
import { Ed25519Keypair } from './keypair.js';
import { SharedKeypair } from './shared-keypair.js';

export const ENCRYPTED_KEY_PREFIX = 'encrypted:';
export const UNENCRYPTED_KEY_PREFIX = 'unencrypted:';

const DECRYPTION_PROMPT = 'Enter decryption password: ';

export type StoredKeypairValue =
	| { readonly kind: 'raw'; readonly keypair: SharedKeypair }
	| { readonly kind: 'encrypted'; readonly envelope: Uint8Array };

/**
 * A keypair as kept in a configuration file: either the raw keypair or a
 * password-encrypted envelope. Never mutated; build a new one to change how
 * a key is stored.
 */
export class StoredKeypair {
	private constructor(private readonly value: StoredKeypairValue) {}

	static raw(keypair: SharedKeypair): StoredKeypair {
		return new StoredKeypair({ kind: 'raw', keypair: keypair.clone() });
	}

	static encrypted(envelope: Uint8Array): StoredKeypair {
		return new StoredKeypair({ kind: 'encrypted', envelope: envelope.slice() });
	}

	/**
	 * Prepare a keypair for storage. Without a password the keypair is stored
	 * raw. Either way the caller gets back the same live handle it passed in.
	 */
	static async create(
		keypair: SharedKeypair,
		password?: string,
	): Promise<[StoredKeypair, SharedKeypair]> {
		if (password === undefined) {
			logger.debug('Storing keypair unencrypted');
			return [StoredKeypair.raw(keypair), keypair];
		}

		const plaintext = keypair.toBytes();
		try {
			const envelope = await encrypt(plaintext, password);
			logger.debug('Keypair encrypted for storage');
			return [new StoredKeypair({ kind: 'encrypted', envelope }), keypair];
		} finally {
			plaintext.fill(0);
		}
	}

	/**
	 * Decode a stored keypair string. The `unencrypted:` prefix is tried
	 * before `encrypted:`.
	 */
	static parse(text: string): StoredKeypair {
		if (text.startsWith(UNENCRYPTED_KEY_PREFIX)) {
			const raw = text.slice(UNENCRYPTED_KEY_PREFIX.length);
			try {
				return StoredKeypair.raw(SharedKeypair.from(Ed25519Keypair.fromHex(raw)));
			} catch (err: unknown) {
				throw invalidString(err);
			}
		}
		if (text.startsWith(ENCRYPTED_KEY_PREFIX)) {
			const encrypted = text.slice(ENCRYPTED_KEY_PREFIX.length);
			try {
				return new StoredKeypair({ kind: 'encrypted', envelope: hexToBytes(encrypted) });
			} catch (err: unknown) {
				throw invalidString(err);
			}
		}
		throw new DeserializeStoredKeypairError(StoredKeypairErrorCode.MISSING_PREFIX);
	}

	get kind(): StoredKeypairValue['kind'] {
		return this.value.kind;
	}

	isEncrypted(): boolean {
		return this.value.kind === 'encrypted';
	}

	/** Copy of the `[salt][iv][ciphertext][authTag]` bytes, or null when raw. */
	envelopeBytes(): Uint8Array | null {
		return this.value.kind === 'encrypted' ? this.value.envelope.slice() : null;
	}

	/**
	 * Get a usable keypair. A raw keypair is returned as a clone of its handle.
	 * An encrypted one is only decrypted when `decrypt` is set, after asking
	 * `passwords` for the password.
	 */
	async get(decrypt: boolean, passwords: IPasswordProvider): Promise<SharedKeypair> {
		const { value } = this;
		if (value.kind === 'raw') {
			return value.keypair.clone();
		}
		if (!decrypt) {
			throw new DecryptionError(DecryptionErrorCode.NOT_DECRYPTING);
		}

		const password = await passwords.readPassword(DECRYPTION_PROMPT);
		const plaintext = await decryptEnvelope(value.envelope, password);
		try {
			return SharedKeypair.from(Ed25519Keypair.fromBytes(plaintext));
		} catch {
			logger.warn('Decrypted keypair has an invalid layout');
			throw new DecryptionError(DecryptionErrorCode.DESERIALIZING);
		} finally {
			plaintext.fill(0);
		}
	}

	toString(): string {
		const { value } = this;
		switch (value.kind) {
			case 'raw':
				return `${UNENCRYPTED_KEY_PREFIX}${value.keypair.toString()}`;
			case 'encrypted':
				return `${ENCRYPTED_KEY_PREFIX}${bytesToHex(value.envelope)}`;
		}
	}

	/** Serialize as the prefixed string so JSON config files hold a plain string. */
	toJSON(): string {
		return this.toString();
	}
}

const logger = new Logger(StoredKeypair.name);

async function decryptEnvelope(envelope: Uint8Array, password: string): Promise<Uint8Array> {
	try {
		const plaintext = await decrypt(envelope, password);
		logger.debug('Keypair decrypted');
		return plaintext;
	} catch (err: unknown) {
		if (err instanceof DecryptionError) {
			logger.warn(`Keypair decryption failed: ${err.message}`);
		}
		throw err;
	}
}

function invalidString(err: unknown): DeserializeStoredKeypairError {
	return new DeserializeStoredKeypairError(
		StoredKeypairErrorCode.INVALID_STORED_KEYPAIR_STRING,
		err instanceof Error ? err.message : String(err),
	);
}
