/**
 * Logger plugin interface.
 */

import type { LogEntry } from './types.js';

/** A log sink. Loggers must never throw from log(). */
export interface Logger {
	readonly id: string;
	/** Apply logger-specific configuration */
	init(config: Record<string, unknown>): Promise<void>;
	/** Receive one entry */
	log(entry: LogEntry): void | Promise<void>;
	/** Write out anything buffered */
	flush(): Promise<void>;
	/** Flush and release resources */
	shutdown(): Promise<void>;
}

/** What a logger package's register() returns */
export interface LoggerRegistration {
	/** Logger type referenced from config (e.g., "console") */
	id: string;
	logger: new () => Logger;
	/** JSON Schema for the logger's config block */
	configSchema?: Record<string, unknown>;
}
