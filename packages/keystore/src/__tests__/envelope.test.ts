import { randomBytes } from 'node:crypto';
import { DecryptionErrorCode } from '@keyseal/core';
import { describe, expect, it } from 'vitest';
import {
	AEAD_OVERHEAD,
	SALT_LENGTH,
	decrypt,
	deriveKey,
	encrypt,
	newSalt,
	open,
	seal,
	splitEnvelope,
} from '../envelope.js';
import { DecryptionError } from '../errors.js';

function randomKey(): Uint8Array {
	return new Uint8Array(randomBytes(32));
}

async function decryptionCode(promise: Promise<unknown>): Promise<DecryptionErrorCode | null> {
	try {
		await promise;
		return null;
	} catch (err: unknown) {
		if (err instanceof DecryptionError) return err.code;
		throw err;
	}
}

function codeOf(fn: () => unknown): DecryptionErrorCode | null {
	try {
		fn();
		return null;
	} catch (err: unknown) {
		if (err instanceof DecryptionError) return err.code;
		throw err;
	}
}

describe('envelope', () => {
	// -----------------------------------------------------------------------
	// Salt
	// -----------------------------------------------------------------------

	describe('newSalt', () => {
		it('returns fixed-length salts that differ between calls', () => {
			const a = newSalt();
			const b = newSalt();

			expect(a.length).toBe(SALT_LENGTH);
			expect(SALT_LENGTH).toBe(32);
			expect(Buffer.from(a).toString('hex')).not.toBe(Buffer.from(b).toString('hex'));
		});
	});

	// -----------------------------------------------------------------------
	// Key derivation
	// -----------------------------------------------------------------------

	describe('deriveKey', () => {
		it('is deterministic for the same salt and password, and password-sensitive', async () => {
			const salt = new Uint8Array(SALT_LENGTH).fill(1);

			const first = await deriveKey(salt, 'correct');
			const second = await deriveKey(salt, 'correct');
			const other = await deriveKey(salt, 'wrong');

			expect(first.length).toBe(32);
			expect(second).toEqual(first);
			expect(other).not.toEqual(first);
		});
	});

	// -----------------------------------------------------------------------
	// AEAD
	// -----------------------------------------------------------------------

	describe('seal / open', () => {
		it('round-trips and adds a fixed overhead', () => {
			const key = randomKey();
			const plaintext = new Uint8Array(64).fill(42);

			const sealed = seal(key, plaintext);

			expect(sealed.length).toBe(64 + AEAD_OVERHEAD);
			expect(AEAD_OVERHEAD).toBe(28);
			expect(open(key, sealed)).toEqual(plaintext);
		});

		it('uses a fresh IV for every seal', () => {
			const key = randomKey();
			const plaintext = new Uint8Array(16);

			expect(seal(key, plaintext)).not.toEqual(seal(key, plaintext));
		});

		it('rejects the wrong key', () => {
			const sealed = seal(randomKey(), new Uint8Array(64));
			expect(() => open(randomKey(), sealed)).toThrow(DecryptionError);
		});

		it('rejects tampered ciphertext as a decryption failure', () => {
			const key = randomKey();
			const sealed = seal(key, new Uint8Array(64));
			const tampered = sealed.map((b, i) => (i === 20 ? b ^ 0x01 : b));

			expect(codeOf(() => open(key, tampered))).toBe(DecryptionErrorCode.DECRYPTION);
		});

		it('rejects input too short to hold an IV and tag', () => {
			expect(codeOf(() => open(randomKey(), new Uint8Array(AEAD_OVERHEAD - 1)))).toBe(
				DecryptionErrorCode.DECRYPTION,
			);
		});
	});

	// -----------------------------------------------------------------------
	// Envelope
	// -----------------------------------------------------------------------

	describe('splitEnvelope', () => {
		it('splits at the salt length', () => {
			const envelope = new Uint8Array(SALT_LENGTH + 5).map((_, i) => i);
			const { salt, sealed } = splitEnvelope(envelope);

			expect(salt).toEqual(envelope.slice(0, SALT_LENGTH));
			expect(sealed).toEqual(new Uint8Array([32, 33, 34, 35, 36]));
		});

		it('reports a bad salt when the envelope is shorter than the salt', () => {
			expect(codeOf(() => splitEnvelope(new Uint8Array(SALT_LENGTH - 1)))).toBe(
				DecryptionErrorCode.BAD_SALT,
			);
		});
	});

	describe('encrypt / decrypt', () => {
		it('round-trips under the same password and fails under another', async () => {
			const plaintext = new Uint8Array(64).map((_, i) => i);

			const envelope = await encrypt(plaintext, 'hunter2');

			expect(envelope.length).toBe(SALT_LENGTH + 64 + AEAD_OVERHEAD);
			expect(await decrypt(envelope, 'hunter2')).toEqual(plaintext);
			expect(await decryptionCode(decrypt(envelope, 'hunter3'))).toBe(
				DecryptionErrorCode.DECRYPTION,
			);
		});

		it('fails with a bad salt before deriving a key', async () => {
			expect(await decryptionCode(decrypt(new Uint8Array(4), 'pw'))).toBe(
				DecryptionErrorCode.BAD_SALT,
			);
		});
	});
});
