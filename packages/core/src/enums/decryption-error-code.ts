export enum DecryptionErrorCode {
	BAD_SALT = 'bad_salt',
	DECRYPTION = 'decryption',
	DESERIALIZING = 'deserializing',
	NOT_DECRYPTING = 'not_decrypting',
}
