/**
 * Byte layout of an encrypted keypair:
 * ```
 * [salt][iv][ciphertext][authTag]
 * ```
 */
export interface EnvelopeLayout {
	readonly saltLength: number;
	readonly ivLength: number;
	readonly authTagLength: number;
	readonly algorithm: 'aes-256-gcm';
}
