import chalk, { type ChalkInstance } from 'chalk';

// ---------------------------------------------------------------------------
// Monochrome palette. Color only for semantic meaning.
// ---------------------------------------------------------------------------

export const bold: ChalkInstance = chalk.bold;
export const dim: ChalkInstance = chalk.dim;
export const success: ChalkInstance = chalk.hex('#22c55e');

// Pass as `theme` to @inquirer/prompts, e.g. password({ message, theme: promptTheme })
export const promptTheme = {
	prefix: {
		idle: bold('?'),
		done: success('✓'),
	},
	style: {
		answer: (text: string) => bold(text),
		help: (text: string) => dim(text),
	},
};
