export interface KdfParams {
	readonly algorithm: 'argon2i';
	/** Passes over memory. */
	readonly iterations: number;
	/** Memory cost in KiB. */
	readonly memoryKib: number;
	readonly parallelism: number;
	/** Derived key length in bytes. */
	readonly keyLength: number;
}
