import { timingSafeEqual } from 'node:crypto';
import { ed25519 } from '@noble/curves/ed25519';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';

export const SECRET_KEY_LENGTH = 32;
export const PUBLIC_KEY_LENGTH = 32;
/** Canonical serialization: `[secret — 32 bytes][public — 32 bytes]`. */
export const KEYPAIR_LENGTH = SECRET_KEY_LENGTH + PUBLIC_KEY_LENGTH;

/**
 * An ed25519 signing keypair. Immutable; every accessor hands out a copy so
 * callers cannot reach the backing arrays.
 */
export class Ed25519Keypair {
	private constructor(
		private readonly secret: Uint8Array,
		private readonly pub: Uint8Array,
	) {}

	/**
	 * Decode the canonical 64-byte form. The public half must be a valid curve
	 * point; it is not checked against the secret half.
	 */
	static fromBytes(bytes: Uint8Array): Ed25519Keypair {
		if (bytes.length !== KEYPAIR_LENGTH) {
			throw new Error(`Keypair must be ${KEYPAIR_LENGTH} bytes, got ${bytes.length}`);
		}
		const pub = bytes.slice(SECRET_KEY_LENGTH);
		try {
			ed25519.ExtendedPoint.fromHex(pub);
		} catch (err: unknown) {
			throw new Error(
				`Invalid ed25519 public key: ${err instanceof Error ? err.message : String(err)}`,
			);
		}
		return new Ed25519Keypair(bytes.slice(0, SECRET_KEY_LENGTH), pub);
	}

	/** Decode the canonical hex form. Accepts either case. */
	static fromHex(hex: string): Ed25519Keypair {
		return Ed25519Keypair.fromBytes(hexToBytes(hex));
	}

	/** Build a keypair from an existing 32-byte seed, deriving its public half. */
	static fromSeed(seed: Uint8Array): Ed25519Keypair {
		if (seed.length !== SECRET_KEY_LENGTH) {
			throw new Error(`Seed must be ${SECRET_KEY_LENGTH} bytes, got ${seed.length}`);
		}
		return new Ed25519Keypair(seed.slice(), ed25519.getPublicKey(seed));
	}

	get publicKey(): Uint8Array {
		return this.pub.slice();
	}

	toBytes(): Uint8Array {
		const out = new Uint8Array(KEYPAIR_LENGTH);
		out.set(this.secret, 0);
		out.set(this.pub, SECRET_KEY_LENGTH);
		return out;
	}

	toHex(): string {
		return bytesToHex(this.toBytes());
	}

	sign(message: Uint8Array): Uint8Array {
		return ed25519.sign(message, this.secret);
	}

	verify(signature: Uint8Array, message: Uint8Array): boolean {
		return ed25519.verify(signature, message, this.pub);
	}

	/** Constant-time comparison of the full 64 bytes. */
	equals(other: Ed25519Keypair): boolean {
		return timingSafeEqual(this.toBytes(), other.toBytes());
	}
}
