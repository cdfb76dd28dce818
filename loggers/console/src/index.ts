/**
 * @cadence/logger-console: registration entry point.
 */

import type { LoggerRegistration } from '@cadence/sdk';
import { ConsoleLogger } from './console-logger.js';

export function register(): LoggerRegistration {
	return {
		id: 'console',
		logger: ConsoleLogger,
		configSchema: {
			type: 'object',
			properties: {
				level: {
					type: 'string',
					enum: ['debug', 'info', 'warn', 'error'],
					description: 'Minimum level to print',
					default: 'info',
				},
				color: {
					type: 'boolean',
					description: 'ANSI colors (default: on when stdout is a TTY)',
				},
				verbose: {
					type: 'boolean',
					description: 'Print entry metadata below each line',
					default: false,
				},
			},
			additionalProperties: false,
		},
	};
}

export { ConsoleLogger } from './console-logger.js';
export type { ConsoleLoggerConfig } from './console-logger.js';
export { entryLevel, formatCompact, formatVerbose, shouldLog } from './format.js';
