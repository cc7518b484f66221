import { type LogLevel, Logger } from '@nestjs/common';
import { LOG_THRESHOLDS, type LogThreshold } from './config.js';

/** Every level at or above `threshold`. `fatal` is always on. */
export function logLevelsFor(threshold: LogThreshold): LogLevel[] {
	const enabled = LOG_THRESHOLDS.slice(0, LOG_THRESHOLDS.indexOf(threshold) + 1);
	return ['fatal', ...enabled];
}

export function configureLogging(threshold: LogThreshold): void {
	Logger.overrideLogger(logLevelsFor(threshold));
}
