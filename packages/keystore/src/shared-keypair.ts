import type { Ed25519Keypair } from './keypair.js';

interface KeypairCell {
	keypair: Ed25519Keypair;
	locked: boolean;
}

/** Scoped access to a locked keypair. Revoked once the lock is released. */
export interface KeypairGuard {
	readonly keypair: Ed25519Keypair;
	replace(next: Ed25519Keypair): void;
}

/**
 * A shareable reference to one in-memory keypair. Clones point at the same
 * cell, so a replacement made through one clone is seen by all of them.
 */
export class SharedKeypair {
	private constructor(private readonly cell: KeypairCell) {}

	static from(keypair: Ed25519Keypair): SharedKeypair {
		return new SharedKeypair({ keypair, locked: false });
	}

	/**
	 * Run `fn` with exclusive access to the keypair. `fn` must be synchronous:
	 * the guard is revoked as soon as it returns or throws. Taking the lock
	 * again from inside `fn`, through any clone, throws.
	 */
	withLock<T>(fn: (guard: KeypairGuard) => T): T {
		const { cell } = this;
		if (cell.locked) {
			throw new Error('Keypair is already locked');
		}
		cell.locked = true;

		let released = false;
		const assertHeld = (): void => {
			if (released) throw new Error('Keypair guard used after release');
		};
		const guard: KeypairGuard = {
			get keypair() {
				assertHeld();
				return cell.keypair;
			},
			replace(next) {
				assertHeld();
				cell.keypair = next;
			},
		};

		try {
			return fn(guard);
		} finally {
			released = true;
			cell.locked = false;
		}
	}

	publicKey(): Uint8Array {
		return this.withLock((guard) => guard.keypair.publicKey);
	}

	/** Snapshot of the canonical 64-byte form. */
	toBytes(): Uint8Array {
		return this.withLock((guard) => guard.keypair.toBytes());
	}

	clone(): SharedKeypair {
		return new SharedKeypair(this.cell);
	}

	sharesStorageWith(other: SharedKeypair): boolean {
		return this.cell === other.cell;
	}

	/** Canonical hex of the full keypair, secret half included. */
	toString(): string {
		return this.withLock((guard) => guard.keypair.toHex());
	}
}
