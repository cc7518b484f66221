/**
 * Persistence for stored keypair strings. The store treats every value as an
 * opaque string; decoding belongs to the keystore.
 */
export interface IKeypairStore {
	load(): Promise<Map<string, string>>;
	save(entries: ReadonlyMap<string, string>): Promise<void>;
}
