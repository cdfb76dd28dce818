/**
 * Runtime: owns one registry, one controller collection and the host's
 * signal sources for a single execution context.
 *
 * Controllers are loaded in batches. Each start() orders the units loaded
 * since the previous start(), runs their init hooks, and connects their
 * signal handlers; earlier units are never initialized or connected again.
 */

import type {
	ControllerContext,
	ControllerDefinition,
	ExecutionContext,
	LogPhase,
	RuntimeStatus,
	SignalSources,
	UnitNode,
} from '@cadence/sdk';
import { DEFAULT_PRIORITY } from '@cadence/sdk';
import { ControllerCollection } from './collection.js';
import type { ControllerUnit } from './controller-unit.js';
import { runInit } from './lifecycle.js';
import type { LoadSummary } from './loader.js';
import { loadModules } from './loader.js';
import type { LogFields } from './logger.js';
import { LoggerManager } from './logger.js';
import { UnitRegistry } from './registry.js';
import { resolveOrder } from './resolver.js';
import { connectSignals } from './signals.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RuntimeOptions {
	/** Which side of the host this runtime runs on */
	context: ExecutionContext;
	/** Root name indexed shallowly by discover() (default: "Packages") */
	sharedRootName?: string;
	/** Priority for controllers that declare none (default: 500) */
	defaultPriority?: number;
	/** Host signal sources connected on start() */
	signals?: SignalSources;
	/** Shared logger manager (default: new LoggerManager) */
	loggerManager?: LoggerManager;
	/** Clock used for init timing (default: Date.now) */
	now?: () => number;
}

// ─── Runtime Class ───────────────────────────────────────────────────────────

export class Runtime {
	readonly context: ExecutionContext;
	readonly loggerManager: LoggerManager;

	private readonly registry: UnitRegistry;
	private readonly collection = new ControllerCollection();
	private readonly defaultPriority: number;
	private readonly now: () => number;
	private signals: SignalSources;

	private readonly order: ControllerUnit[] = [];
	private readonly resolved = new Set<ControllerUnit>();
	private running = false;

	constructor(options: RuntimeOptions) {
		this.context = options.context;
		this.loggerManager = options.loggerManager ?? new LoggerManager();
		this.defaultPriority = options.defaultPriority ?? DEFAULT_PRIORITY;
		this.now = options.now ?? Date.now;
		this.signals = { ...options.signals };
		this.registry = new UnitRegistry({
			sharedRootName: options.sharedRootName,
			log: (phase, fields) => this.emitLog(phase, fields),
		});
	}

	// ─── Discovery & Loading ─────────────────────────────────────────────────

	/** Index every unit reachable from `roots`, replacing any earlier index. */
	discover(roots: readonly UnitNode[]): void {
		this.registry.init(roots);
		this.emitLog('runtime.discover', {
			result: `${this.registry.size} units discovered`,
			metadata: { roots: roots.map((r) => r.name) },
		});
	}

	/** Load controllers from a root node or an explicit list of nodes. */
	loadModules(source: UnitNode | UnitNode[]): LoadSummary {
		return loadModules(source, {
			registry: this.registry,
			collection: this.collection,
			context: this.context,
			log: (phase, fields) => this.emitLog(phase, fields),
		});
	}

	// ─── Lifecycle ───────────────────────────────────────────────────────────

	/**
	 * Order, initialize and connect every controller loaded since the last
	 * start(). Returns the names of the newly ordered controllers.
	 */
	start(): string[] {
		const pending = this.collection.list().filter((unit) => !this.resolved.has(unit));
		const batch = resolveOrder(pending, this.collection.index(), {
			defaultPriority: this.defaultPriority,
			registry: this.registry,
			resolved: this.resolved,
			log: (phase, fields) => this.emitLog(phase, fields),
		});
		for (const unit of batch) {
			this.resolved.add(unit);
			this.order.push(unit);
		}

		const init = runInit(batch, {
			makeContext: (unit) => this.makeContext(unit),
			log: (phase, fields) => this.emitLog(phase, fields),
			now: this.now,
		});
		const connected = this.connectSignals();

		this.running = true;
		this.emitLog('runtime.start', {
			result: `started ${batch.length} units`,
			metadata: {
				order: batch.map((u) => u.name),
				initialized: init.initialized.length,
				skipped: init.skipped.length,
				failed: init.failed.length,
				signals: connected,
			},
		});

		return batch.map((u) => u.name);
	}

	/**
	 * Connect handlers of every ordered controller. Sources passed here are
	 * merged over the ones given at construction. Returns the number of new
	 * subscriptions.
	 */
	connectSignals(sources?: SignalSources): number {
		if (sources) {
			this.signals = { ...this.signals, ...sources };
		}
		return connectSignals(this.order, this.signals, {
			context: this.context,
			log: (phase, fields) => this.emitLog(phase, fields),
		});
	}

	/** Flush and shut down every logger. */
	async shutdown(): Promise<void> {
		await this.loggerManager.log({
			timestamp: new Date().toISOString(),
			phase: 'runtime.shutdown',
			context: this.context,
			result: 'shutting down',
		});
		this.running = false;
		await this.loggerManager.flush();
		await this.loggerManager.shutdown();
	}

	// ─── Lookups ─────────────────────────────────────────────────────────────

	/** Resolve a unit by name through the registry. */
	import(name: string): unknown {
		return this.registry.import(name);
	}

	/** The controller indexed under `name`, if one is loaded. */
	getController(name: string): ControllerDefinition | undefined {
		return this.collection.get(name)?.definition;
	}

	/** Names of all ordered controllers, in initialization order. */
	getOrder(): string[] {
		return this.order.map((u) => u.name);
	}

	status(): RuntimeStatus {
		return {
			context: this.context,
			discovered: this.registry.size,
			running: this.running,
			units: this.collection.list().map((u) => u.status()),
		};
	}

	// ─── Internal ────────────────────────────────────────────────────────────

	private makeContext(unit: ControllerUnit): ControllerContext {
		return {
			name: unit.name,
			context: this.context,
			import: (name) => this.import(name),
			getController: (name) => this.getController(name),
			log: (level, message, metadata) => {
				this.emitLog('lifecycle.log', {
					unit: unit.name,
					result: message,
					metadata: { ...metadata, level },
				});
			},
		};
	}

	private emitLog(phase: LogPhase, fields: LogFields = {}): void {
		this.loggerManager.emit(phase, { context: this.context, ...fields });
	}
}
