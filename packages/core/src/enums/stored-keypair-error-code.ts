export enum StoredKeypairErrorCode {
	MISSING_PREFIX = 'missing_prefix',
	INVALID_STORED_KEYPAIR_STRING = 'invalid_stored_keypair_string',
}
