/**
 * Human-readable console logger.
 *
 * One compact line per entry on stdout, colored when stdout is a TTY.
 * Entries below the configured level are dropped.
 */

import type { LogEntry, Logger } from '@cadence/sdk';
import { formatCompact, formatVerbose, shouldLog } from './format.js';

export interface ConsoleLoggerConfig {
	level: string;
	color: boolean;
	verbose: boolean;
}

function readConfig(config: Record<string, unknown>): ConsoleLoggerConfig {
	return {
		level: typeof config.level === 'string' ? config.level : 'info',
		color: typeof config.color === 'boolean' ? config.color : process.stdout.isTTY === true,
		verbose: config.verbose === true,
	};
}

export class ConsoleLogger implements Logger {
	readonly id = 'console';
	private config: ConsoleLoggerConfig = { level: 'info', color: false, verbose: false };

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = readConfig(config);
	}

	log(entry: LogEntry): void {
		if (!shouldLog(entry, this.config.level)) return;
		const line = this.config.verbose
			? formatVerbose(entry, this.config.color)
			: formatCompact(entry, this.config.color);
		process.stdout.write(`${line}\n`);
	}

	async flush(): Promise<void> {
		// Writes are unbuffered
	}

	async shutdown(): Promise<void> {}
}
