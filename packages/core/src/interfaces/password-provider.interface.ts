/**
 * Source of decryption passwords. Only consulted when a caller has opted in to
 * decrypting a stored keypair.
 */
export interface IPasswordProvider {
	readPassword(message: string): Promise<string>;
}
