import { describe, expect, it } from 'vitest';
import { Ed25519Keypair } from '../keypair.js';
import { SharedKeypair } from '../shared-keypair.js';

function keypairOf(byte: number): Ed25519Keypair {
	return Ed25519Keypair.fromSeed(new Uint8Array(32).fill(byte));
}

describe('SharedKeypair', () => {
	it('exposes the public key and canonical bytes', () => {
		const keypair = keypairOf(1);
		const handle = SharedKeypair.from(keypair);

		expect(handle.publicKey()).toEqual(keypair.publicKey);
		expect(handle.toBytes()).toEqual(keypair.toBytes());
		expect(handle.toString()).toBe(keypair.toHex());
	});

	it('clones share storage', () => {
		const handle = SharedKeypair.from(keypairOf(1));
		const clone = handle.clone();

		expect(clone.sharesStorageWith(handle)).toBe(true);
		expect(SharedKeypair.from(keypairOf(1)).sharesStorageWith(handle)).toBe(false);
	});

	it('makes a replacement through one clone visible through the other', () => {
		const handle = SharedKeypair.from(keypairOf(1));
		const clone = handle.clone();
		const replacement = keypairOf(2);

		clone.withLock((guard) => guard.replace(replacement));

		expect(handle.toBytes()).toEqual(replacement.toBytes());
		expect(handle.publicKey()).toEqual(replacement.publicKey);
	});

	it('returns snapshots that later writes do not change', () => {
		const handle = SharedKeypair.from(keypairOf(1));
		const before = handle.toBytes();

		handle.clone().withLock((guard) => guard.replace(keypairOf(2)));

		expect(before).toEqual(keypairOf(1).toBytes());
	});

	it('rejects taking the lock twice, through any clone', () => {
		const handle = SharedKeypair.from(keypairOf(1));
		const clone = handle.clone();

		expect(() => handle.withLock(() => clone.toBytes())).toThrow('Keypair is already locked');
		expect(clone.toBytes()).toEqual(keypairOf(1).toBytes());
	});

	it('releases the lock when the callback throws', () => {
		const handle = SharedKeypair.from(keypairOf(1));

		expect(() =>
			handle.withLock(() => {
				throw new Error('signing failed');
			}),
		).toThrow('signing failed');
		expect(handle.publicKey()).toEqual(keypairOf(1).publicKey);
	});

	it('revokes the guard after release', () => {
		const handle = SharedKeypair.from(keypairOf(1));
		const leaked = handle.withLock((guard) => guard);

		expect(() => leaked.keypair).toThrow('Keypair guard used after release');
		expect(() => leaked.replace(keypairOf(2))).toThrow('Keypair guard used after release');
		expect(handle.toBytes()).toEqual(keypairOf(1).toBytes());
	});

	it('signs under the lock', () => {
		const handle = SharedKeypair.from(keypairOf(4));
		const message = new TextEncoder().encode('hello');

		const signature = handle.withLock((guard) => guard.keypair.sign(message));

		expect(keypairOf(4).verify(signature, message)).toBe(true);
	});
});
