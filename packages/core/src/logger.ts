/**
 * Logger fan-out manager.
 *
 * Fans out LogEntry to all configured loggers.
 * Non-blocking: errors in one logger don't affect others.
 */

import type { LogEntry, Logger, LogPhase } from '@cadence/sdk';
import { errorMessage } from './errors.js';

/** Entry fields a caller supplies; timestamp and phase are filled in by emit() */
export type LogFields = Omit<LogEntry, 'timestamp' | 'phase'>;

/** Synchronous log function handed to the orchestration components */
export type EmitLog = (phase: LogPhase, fields?: LogFields) => void;

export class LoggerManager {
	private readonly loggers: Logger[] = [];

	addLogger(logger: Logger): void {
		this.loggers.push(logger);
	}

	/**
	 * Fan out a log entry to all loggers.
	 * Every logger receives the entry before the first await, so synchronous
	 * loggers have it by the time this returns its promise.
	 */
	async log(entry: LogEntry): Promise<void> {
		await Promise.allSettled(
			this.loggers.map(async (logger) => {
				try {
					await logger.log(entry);
				} catch (err) {
					reportLoggerFailure(logger, 'log', err);
				}
			}),
		);
	}

	/** Build an entry for `phase` and fan it out without waiting. */
	emit(phase: LogPhase, fields: LogFields = {}): void {
		void this.log({ timestamp: new Date().toISOString(), phase, ...fields });
	}

	/** Flush all loggers */
	async flush(): Promise<void> {
		await Promise.allSettled(
			this.loggers.map(async (logger) => {
				try {
					await logger.flush();
				} catch (err) {
					reportLoggerFailure(logger, 'flush', err);
				}
			}),
		);
	}

	/** Shutdown all loggers */
	async shutdown(): Promise<void> {
		await Promise.allSettled(
			this.loggers.map(async (logger) => {
				try {
					await logger.shutdown();
				} catch (err) {
					reportLoggerFailure(logger, 'shutdown', err);
				}
			}),
		);
	}
}

function reportLoggerFailure(logger: Logger, operation: string, err: unknown): void {
	console.error(`[cadence] logger "${logger.id}" failed to ${operation}: ${errorMessage(err)}`);
}
