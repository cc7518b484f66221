import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { IKeypairStore } from '@keyseal/core';
import { Logger } from '@nestjs/common';
import { z } from 'zod';

const keyFileSchema = z.object({
	version: z.literal(1),
	keys: z.record(z.string()),
});

export type KeyFileContents = z.infer<typeof keyFileSchema>;

/**
 * Keeps stored keypair strings in a JSON file:
 * ```json
 * { "version": 1, "keys": { "<alias>": "encrypted:…" } }
 * ```
 * A missing file reads as empty.
 */
export class JsonKeyFileStore implements IKeypairStore {
	private readonly logger = new Logger(JsonKeyFileStore.name);

	constructor(private readonly path: string) {}

	async load(): Promise<Map<string, string>> {
		if (!existsSync(this.path)) {
			this.logger.debug(`No key file at ${this.path}`);
			return new Map();
		}

		const raw = await readFile(this.path, 'utf-8');
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch {
			throw new Error(`Invalid key file at ${this.path}: not valid JSON`);
		}

		const result = keyFileSchema.safeParse(parsed);
		if (!result.success) {
			const issues = result.error.issues
				.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
				.join('; ');
			throw new Error(`Invalid key file at ${this.path}: ${issues}`);
		}

		return new Map(Object.entries(result.data.keys));
	}

	async save(entries: ReadonlyMap<string, string>): Promise<void> {
		const contents: KeyFileContents = {
			version: 1,
			keys: Object.fromEntries([...entries].sort(([a], [b]) => a.localeCompare(b))),
		};

		await mkdir(dirname(this.path), { recursive: true, mode: 0o700 });

		// Write with restrictive permissions first, then atomically rename.
		const tmpPath = `${this.path}.tmp`;
		await writeFile(tmpPath, `${JSON.stringify(contents, null, '\t')}\n`, {
			encoding: 'utf-8',
			mode: 0o600,
		});
		await rename(tmpPath, this.path);
		this.logger.debug(`Wrote ${entries.size} key(s) to ${this.path}`);
	}
}
