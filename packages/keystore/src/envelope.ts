import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { DecryptionErrorCode, type EnvelopeLayout, type KdfParams } from '@keyseal/core';
import { argon2iAsync } from '@noble/hashes/argon2';
import { utf8ToBytes } from '@noble/hashes/utils';
import { DecryptionError } from './errors.js';

// ---------------------------------------------------------------------------
// Constants
//
// Both tables are part of the persisted format. Changing any value makes
// existing envelopes undecryptable.
// ---------------------------------------------------------------------------

export const KDF_PARAMS: KdfParams = {
	algorithm: 'argon2i',
	iterations: 3,
	memoryKib: 1 << 16,
	parallelism: 1,
	keyLength: 32,
};

export const ENVELOPE_LAYOUT: EnvelopeLayout = {
	saltLength: 32,
	ivLength: 12,
	authTagLength: 16,
	algorithm: 'aes-256-gcm',
};

export const SALT_LENGTH = ENVELOPE_LAYOUT.saltLength;
/** Bytes `seal` adds on top of the plaintext (IV + auth tag). */
export const AEAD_OVERHEAD = ENVELOPE_LAYOUT.ivLength + ENVELOPE_LAYOUT.authTagLength;

// ---------------------------------------------------------------------------
// Key derivation
// ---------------------------------------------------------------------------

export function newSalt(): Uint8Array {
	return new Uint8Array(randomBytes(SALT_LENGTH));
}

/**
 * Derive a 32-byte encryption key from a password with Argon2i.
 * A failure here means the host ran out of resources, not bad input.
 */
export async function deriveKey(salt: Uint8Array, password: string): Promise<Uint8Array> {
	try {
		return await argon2iAsync(utf8ToBytes(password), salt, {
			t: KDF_PARAMS.iterations,
			m: KDF_PARAMS.memoryKib,
			p: KDF_PARAMS.parallelism,
			dkLen: KDF_PARAMS.keyLength,
		});
	} catch (err: unknown) {
		throw new Error('Generation of encryption secret key failed', { cause: err });
	}
}

// ---------------------------------------------------------------------------
// AEAD
// ---------------------------------------------------------------------------

/**
 * AES-256-GCM with a fresh IV.
 *
 * Output layout:
 * ```
 * [iv — 12 bytes][ciphertext — variable][authTag — 16 bytes]
 * ```
 */
export function seal(key: Uint8Array, plaintext: Uint8Array): Uint8Array {
	const iv = randomBytes(ENVELOPE_LAYOUT.ivLength);
	const cipher = createCipheriv(ENVELOPE_LAYOUT.algorithm, key, iv);
	const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
	const authTag = cipher.getAuthTag();
	return new Uint8Array(Buffer.concat([iv, encrypted, authTag]));
}

/** Inverse of {@link seal}. Any failure is reported as `DECRYPTION`. */
export function open(key: Uint8Array, sealed: Uint8Array): Uint8Array {
	const { ivLength, authTagLength } = ENVELOPE_LAYOUT;
	if (sealed.length < ivLength + authTagLength) {
		throw new DecryptionError(DecryptionErrorCode.DECRYPTION);
	}

	const iv = sealed.subarray(0, ivLength);
	const ciphertext = sealed.subarray(ivLength, sealed.length - authTagLength);
	const authTag = sealed.subarray(sealed.length - authTagLength);

	try {
		const decipher = createDecipheriv(ENVELOPE_LAYOUT.algorithm, key, iv);
		decipher.setAuthTag(authTag);
		return new Uint8Array(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
	} catch {
		throw new DecryptionError(DecryptionErrorCode.DECRYPTION);
	}
}

// ---------------------------------------------------------------------------
// Envelope
// ---------------------------------------------------------------------------

export interface EnvelopeParts {
	readonly salt: Uint8Array;
	readonly sealed: Uint8Array;
}

/** Split `[salt][sealed]` at the fixed salt length. */
export function splitEnvelope(envelope: Uint8Array): EnvelopeParts {
	if (envelope.length < SALT_LENGTH) {
		throw new DecryptionError(DecryptionErrorCode.BAD_SALT);
	}
	return {
		salt: envelope.subarray(0, SALT_LENGTH),
		sealed: envelope.subarray(SALT_LENGTH),
	};
}

/** Encrypt under a fresh salt and return `[salt][iv][ciphertext][authTag]`. */
export async function encrypt(plaintext: Uint8Array, password: string): Promise<Uint8Array> {
	const salt = newSalt();
	const key = await deriveKey(salt, password);
	try {
		const sealed = seal(key, plaintext);
		const envelope = new Uint8Array(salt.length + sealed.length);
		envelope.set(salt, 0);
		envelope.set(sealed, salt.length);
		return envelope;
	} finally {
		key.fill(0);
	}
}

export async function decrypt(envelope: Uint8Array, password: string): Promise<Uint8Array> {
	const { salt, sealed } = splitEnvelope(envelope);
	const key = await deriveKey(salt, password);
	try {
		return open(key, sealed);
	} finally {
		key.fill(0);
	}
}
