/**
 * @cadence/logger-file: registration entry point.
 */

import type { LoggerRegistration } from '@cadence/sdk';
import { FileLogger } from './file-logger.js';

export function register(): LoggerRegistration {
	return {
		id: 'file',
		logger: FileLogger,
		configSchema: {
			type: 'object',
			properties: {
				path: {
					type: 'string',
					description: 'Log file path (default: ~/.cadence/logs/cadence.log)',
				},
				format: {
					type: 'string',
					enum: ['jsonl'],
					description: 'Log format (only "jsonl").',
					default: 'jsonl',
				},
				buffer: {
					type: 'object',
					properties: {
						size: {
							type: 'integer',
							minimum: 1,
							description: 'Buffer N entries before flushing',
							default: 100,
						},
						flush_interval: {
							type: 'string',
							pattern: '^\\d+(ms|s|m|h|d)$',
							description: 'Flush at least every N (e.g., "1s")',
							default: '1s',
						},
					},
					additionalProperties: false,
				},
			},
			additionalProperties: false,
		},
	};
}

export { DEFAULT_LOG_PATH, expandPath, FileLogger, readConfig } from './file-logger.js';
export type { FileLoggerConfig } from './file-logger.js';
