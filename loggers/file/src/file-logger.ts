/**
 * JSONL file logger with buffering.
 *
 * Entries are buffered and appended in batches: when the buffer fills,
 * on every flush interval, and on shutdown. A failed write is reported to
 * stderr and its entries are dropped.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, resolve } from 'node:path';
import type { LogEntry, Logger } from '@cadence/sdk';
import { parseDuration } from '@cadence/sdk';

export const DEFAULT_LOG_PATH = '~/.cadence/logs/cadence.log';

export interface FileLoggerConfig {
	/** Absolute log file path */
	path: string;
	/** Entries buffered before a flush */
	bufferSize: number;
	/** Milliseconds between timed flushes */
	flushIntervalMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Expand a leading ~/ to the home directory and make the path absolute */
export function expandPath(path: string): string {
	const expanded = path.startsWith('~/') ? path.replace('~', homedir()) : path;
	return resolve(expanded);
}

export function readConfig(config: Record<string, unknown>): FileLoggerConfig {
	const buffer = isRecord(config.buffer) ? config.buffer : {};
	return {
		path: expandPath(typeof config.path === 'string' ? config.path : DEFAULT_LOG_PATH),
		bufferSize: typeof buffer.size === 'number' ? buffer.size : 100,
		flushIntervalMs: parseDuration(
			typeof buffer.flush_interval === 'string' ? buffer.flush_interval : '1s',
		),
	};
}

function reportFailure(filePath: string, err: unknown): void {
	const message = err instanceof Error ? err.message : String(err);
	console.error(`[cadence] file logger could not write ${filePath}: ${message}`);
}

export class FileLogger implements Logger {
	readonly id = 'file';
	private filePath = '';
	private buffer: string[] = [];
	private bufferSize = 100;
	private flushTimer: ReturnType<typeof setInterval> | null = null;
	private dirEnsured = false;

	async init(config: Record<string, unknown>): Promise<void> {
		const cfg = readConfig(config);
		this.filePath = cfg.path;
		this.bufferSize = cfg.bufferSize;

		this.flushTimer = setInterval(() => {
			void this.flush();
		}, cfg.flushIntervalMs);
		this.flushTimer.unref();

		// Create log file on init so tail -f works immediately
		try {
			await this.ensureDir();
			await appendFile(this.filePath, '', 'utf-8');
		} catch (err) {
			reportFailure(this.filePath, err);
		}
	}

	get path(): string {
		return this.filePath;
	}

	async log(entry: LogEntry): Promise<void> {
		this.buffer.push(JSON.stringify(entry));
		if (this.buffer.length >= this.bufferSize) {
			await this.flush();
		}
	}

	async flush(): Promise<void> {
		if (this.buffer.length === 0) return;

		const entries = this.buffer.splice(0);
		const data = entries.map((e) => `${e}\n`).join('');

		try {
			await this.ensureDir();
			await appendFile(this.filePath, data, 'utf-8');
		} catch (err) {
			reportFailure(this.filePath, err);
		}
	}

	async shutdown(): Promise<void> {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}
		await this.flush();
	}

	private async ensureDir(): Promise<void> {
		if (this.dirEnsured) return;
		await mkdir(dirname(this.filePath), { recursive: true });
		this.dirEnsured = true;
	}
}
