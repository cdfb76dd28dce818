/**
 * Test harness for controller authors and for the core's own tests.
 *
 * MockSignal stands in for a host signal, MockLogger records log entries,
 * createTestController builds a controller that records its init calls.
 */

import type { ControllerContext, ControllerDefinition, SignalHandlers } from './controller.js';
import type { Logger } from './logger.js';
import type {
	LogEntry,
	LogPhase,
	SignalArgs,
	SignalKind,
	SignalListener,
	SignalSource,
	Subscription,
} from './types.js';

// ─── MockSignal ───────────────────────────────────────────────────────────────

export class MockSignal<K extends SignalKind> implements SignalSource<K> {
	readonly kind: K;
	/** Total number of connect() calls, including ones later unsubscribed */
	connectCount = 0;
	private readonly listeners: SignalListener<K>[] = [];

	constructor(kind: K) {
		this.kind = kind;
	}

	connect(listener: SignalListener<K>): Subscription {
		this.connectCount++;
		this.listeners.push(listener);
		return {
			unsubscribe: () => {
				const idx = this.listeners.indexOf(listener);
				if (idx !== -1) this.listeners.splice(idx, 1);
			},
		};
	}

	/** Invoke every connected listener, in connection order */
	fire(...args: SignalArgs[K]): void {
		for (const listener of [...this.listeners]) {
			listener(...args);
		}
	}

	get listenerCount(): number {
		return this.listeners.length;
	}
}

export type MockSignals = { [K in SignalKind]: MockSignal<K> };

/** One MockSignal per signal kind */
export function createMockSignals(): MockSignals {
	return {
		update: new MockSignal('update'),
		inputBegan: new MockSignal('inputBegan'),
		inputEnded: new MockSignal('inputEnded'),
		actorJoined: new MockSignal('actorJoined'),
		actorLeaving: new MockSignal('actorLeaving'),
		localCharacterAdded: new MockSignal('localCharacterAdded'),
		localCharacterRemoving: new MockSignal('localCharacterRemoving'),
	};
}

// ─── MockLogger ───────────────────────────────────────────────────────────────

export class MockLogger implements Logger {
	readonly id: string;
	readonly entries: LogEntry[] = [];
	config: Record<string, unknown> | null = null;
	initialized = false;
	flushCount = 0;
	shutdownCalled = false;

	constructor(id = 'mock-logger') {
		this.id = id;
	}

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = config;
		this.initialized = true;
	}

	log(entry: LogEntry): void {
		this.entries.push(entry);
	}

	async flush(): Promise<void> {
		this.flushCount++;
	}

	async shutdown(): Promise<void> {
		this.shutdownCalled = true;
	}

	/** Entries recorded for one phase */
	byPhase(phase: LogPhase): LogEntry[] {
		return this.entries.filter((e) => e.phase === phase);
	}

	clear(): void {
		this.entries.length = 0;
	}
}

// ─── Test Controllers ─────────────────────────────────────────────────────────

export interface TestControllerOptions {
	priority?: number;
	dependencies?: string[];
	isServer?: boolean;
	raw?: boolean;
	signals?: SignalHandlers;
	/** Runs inside init(), after the call is recorded */
	onInit?: (ctx: ControllerContext) => void;
}

export interface TestController extends ControllerDefinition {
	/** Contexts passed to init(), one per call */
	initCalls: ControllerContext[];
}

/** Build a controller that records every init() call */
export function createTestController(options: TestControllerOptions = {}): TestController {
	const controller: TestController = {
		initCalls: [],
		init(ctx: ControllerContext) {
			controller.initCalls.push(ctx);
			options.onInit?.(ctx);
		},
	};
	if (options.priority !== undefined) controller.priority = options.priority;
	if (options.dependencies !== undefined) controller.dependencies = options.dependencies;
	if (options.isServer !== undefined) controller.isServer = options.isServer;
	if (options.raw !== undefined) controller.raw = options.raw;
	if (options.signals !== undefined) controller.signals = options.signals;
	return controller;
}
