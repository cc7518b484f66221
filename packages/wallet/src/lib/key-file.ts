import type { IKeypairStore, IPasswordProvider } from '@keyseal/core';
import { type SharedKeypair, StoredKeypair } from '@keyseal/keystore';
import { Logger } from '@nestjs/common';
import type { KeysealConfig } from './config.js';
import { JsonKeyFileStore } from './key-file-store.js';
import { configureLogging } from './logging.js';
import { TerminalPasswordProvider } from './prompt.js';

// ---------------------------------------------------------------------------
// Alias validation
// ---------------------------------------------------------------------------

const VALID_ALIAS_RE = /^[a-zA-Z0-9][a-zA-Z0-9_-]{0,63}$/;

export function validateAlias(alias: string): string | null {
	if (!alias) return 'Alias cannot be empty';
	if (!VALID_ALIAS_RE.test(alias)) {
		return 'Must be 1-64 chars: letters, numbers, hyphens, underscores. Start with alphanumeric.';
	}
	return null;
}

// ---------------------------------------------------------------------------
// KeyFile
// ---------------------------------------------------------------------------

export interface InsertOptions {
	/** Encrypt the stored copy with this password. */
	readonly password?: string;
	/** Replace an existing key with the same alias. */
	readonly force?: boolean;
}

export interface FindOptions {
	/** Prompt for a password when the key is encrypted. */
	readonly decrypt: boolean;
}

/**
 * Named stored keypairs backed by an {@link IKeypairStore}. Keys unlocked
 * through this object are kept in memory, so later lookups share storage
 * with the first one.
 */
export class KeyFile {
	private readonly logger = new Logger(KeyFile.name);
	/** Unlocked keypairs, or unlocks still in flight, by alias. */
	private readonly unlocked = new Map<string, Promise<SharedKeypair>>();
	/** Aliases with an insert in flight. */
	private readonly inserting = new Set<string>();

	private constructor(
		private readonly store: IKeypairStore,
		private readonly passwords: IPasswordProvider,
		private readonly keys: Map<string, StoredKeypair>,
	) {}

	static async open(
		store: IKeypairStore,
		passwords: IPasswordProvider = new TerminalPasswordProvider(),
	): Promise<KeyFile> {
		const entries = await store.load();
		const keys = new Map<string, StoredKeypair>();
		for (const [alias, text] of entries) {
			const invalid = validateAlias(alias);
			if (invalid) throw new Error(`Stored key "${alias}" has an invalid alias: ${invalid}`);
			try {
				keys.set(alias, StoredKeypair.parse(text));
			} catch (err: unknown) {
				throw new Error(
					`Stored key "${alias}" is invalid: ${err instanceof Error ? err.message : String(err)}`,
					{ cause: err },
				);
			}
		}
		return new KeyFile(store, passwords, keys);
	}

	/** Apply the configured log level and open the configured key file. */
	static async fromConfig(
		config: KeysealConfig,
		passwords?: IPasswordProvider,
	): Promise<KeyFile> {
		configureLogging(config.logLevel);
		return KeyFile.open(new JsonKeyFileStore(config.keyFilePath), passwords);
	}

	aliases(): string[] {
		return [...this.keys.keys()].sort();
	}

	has(alias: string): boolean {
		return this.keys.has(alias);
	}

	isEncrypted(alias: string): boolean {
		return this.require(alias).isEncrypted();
	}

	/**
	 * Add a keypair under `alias`. Returns the live handle, which stays
	 * unlocked in memory even when the stored copy is encrypted.
	 */
	async insert(
		alias: string,
		keypair: SharedKeypair,
		options: InsertOptions = {},
	): Promise<SharedKeypair> {
		const invalid = validateAlias(alias);
		if (invalid) throw new Error(`Invalid alias "${alias}": ${invalid}`);
		if ((this.keys.has(alias) || this.inserting.has(alias)) && !options.force) {
			throw new Error(`Key "${alias}" already exists. Pass force to replace it.`);
		}

		this.inserting.add(alias);
		try {
			const [stored, handle] = await StoredKeypair.create(keypair, options.password);
			this.keys.set(alias, stored);
			this.unlocked.set(alias, Promise.resolve(handle));
			this.logger.log(
				`Added key "${alias}" (${stored.isEncrypted() ? 'encrypted' : 'unencrypted'})`,
			);
			return handle;
		} finally {
			this.inserting.delete(alias);
		}
	}

	remove(alias: string): boolean {
		this.unlocked.delete(alias);
		const removed = this.keys.delete(alias);
		if (removed) this.logger.log(`Removed key "${alias}"`);
		return removed;
	}

	/**
	 * Look up a keypair, decrypting it on first use when `decrypt` is set.
	 * Overlapping lookups of one alias share a single unlock; a failed
	 * unlock is forgotten so the next lookup prompts again.
	 */
	async find(alias: string, options: FindOptions = { decrypt: true }): Promise<SharedKeypair> {
		let unlocking = this.unlocked.get(alias);
		if (!unlocking) {
			unlocking = this.require(alias).get(options.decrypt, this.passwords);
			this.unlocked.set(alias, unlocking);
		}

		try {
			return (await unlocking).clone();
		} catch (err: unknown) {
			if (this.unlocked.get(alias) === unlocking) this.unlocked.delete(alias);
			throw err;
		}
	}

	/** Drop every decrypted keypair held by this object. */
	lock(): void {
		this.unlocked.clear();
	}

	async save(): Promise<void> {
		const entries = new Map<string, string>();
		for (const [alias, stored] of this.keys) {
			entries.set(alias, stored.toString());
		}
		await this.store.save(entries);
	}

	private require(alias: string): StoredKeypair {
		const stored = this.keys.get(alias);
		if (!stored) throw new Error(`No key found with alias "${alias}"`);
		return stored;
	}
}
