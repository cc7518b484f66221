import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

export const LOG_THRESHOLDS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type LogThreshold = (typeof LOG_THRESHOLDS)[number];

export interface KeysealConfig {
	/** Directory holding keyseal state. */
	readonly home: string;
	/** JSON file mapping aliases to stored keypair strings. */
	readonly keyFilePath: string;
	readonly logLevel: LogThreshold;
}

const DEFAULT_HOME = join(homedir(), '.keyseal');
const KEY_FILE_NAME = 'keys.json';

function optionalEnv(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
	return env[name] || fallback;
}

function expandHome(path: string): string {
	const expanded = path.startsWith('~') ? join(homedir(), path.slice(1)) : path;
	return isAbsolute(expanded) ? expanded : resolve(expanded);
}

function isLogThreshold(value: string): value is LogThreshold {
	return LOG_THRESHOLDS.some((level) => level === value);
}

export function parseConfig(env: NodeJS.ProcessEnv = process.env): KeysealConfig {
	const home = expandHome(optionalEnv(env, 'KEYSEAL_HOME', DEFAULT_HOME));
	const keyFilePath = expandHome(optionalEnv(env, 'KEYSEAL_KEY_FILE', join(home, KEY_FILE_NAME)));

	const logLevel = optionalEnv(env, 'KEYSEAL_LOG_LEVEL', 'log');
	if (!isLogThreshold(logLevel)) {
		throw new Error(`KEYSEAL_LOG_LEVEL must be one of ${LOG_THRESHOLDS.join(', ')}, got: ${logLevel}`);
	}

	return { home, keyFilePath, logLevel };
}
