import type { IPasswordProvider } from '@keyseal/core';
import { password } from '@inquirer/prompts';
import { promptTheme } from './theme.js';

/** Reads passwords from the terminal with masked input. */
export class TerminalPasswordProvider implements IPasswordProvider {
	async readPassword(message: string): Promise<string> {
		return password({
			// inquirer draws its own separator after the message
			message: message.replace(/:\s*$/, ''),
			mask: '*',
			theme: promptTheme,
		});
	}
}
