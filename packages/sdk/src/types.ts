/**
 * Core type definitions for Cadence.
 *
 * Signal kinds, log entries and runtime status shapes shared by the core,
 * the loggers, and every controller package.
 */

// ─── Execution Context ────────────────────────────────────────────────────────

/** Which side of the host the runtime is running on */
export type ExecutionContext = 'client' | 'server';

// ─── Signals ──────────────────────────────────────────────────────────────────

/** Host input notification (keyboard, mouse, touch, gamepad) */
export interface InputObject {
	/** Input category (e.g., "keyboard", "mouse") */
	type: string;
	/** Key or button identifier, when the input has one */
	key?: string;
	/** Additional host-specific input data */
	[key: string]: unknown;
}

/** A participant in the session, as reported by the host */
export interface ActorRef {
	/** Host-assigned actor identifier */
	id: string | number;
	/** Display name */
	name?: string;
	/** Additional host-specific actor data */
	[key: string]: unknown;
}

/** Argument tuples passed by each host signal */
export interface SignalArgs {
	/** Per rendered frame on the client, per heartbeat on the server */
	update: [deltaTime: number];
	inputBegan: [input: InputObject, processed: boolean];
	inputEnded: [input: InputObject, processed: boolean];
	actorJoined: [actor: ActorRef];
	actorLeaving: [actor: ActorRef];
	localCharacterAdded: [character: unknown];
	localCharacterRemoving: [character: unknown];
}

/** The fixed set of host signals a controller can handle */
export type SignalKind = keyof SignalArgs;

/** Every signal kind, in connection order */
export const SIGNAL_KINDS: readonly SignalKind[] = [
	'update',
	'inputBegan',
	'inputEnded',
	'actorJoined',
	'actorLeaving',
	'localCharacterAdded',
	'localCharacterRemoving',
];

/** Signal kinds that only exist on the client */
export const CLIENT_ONLY_SIGNALS: ReadonlySet<SignalKind> = new Set<SignalKind>([
	'localCharacterAdded',
	'localCharacterRemoving',
]);

/** Listener shape for a given signal kind */
export type SignalListener<K extends SignalKind> = (...args: SignalArgs[K]) => void;

/** Subscription handle */
export interface Subscription {
	unsubscribe(): void;
}

/** A host-owned signal that accepts listeners. Hosts may return no handle. */
export interface SignalSource<K extends SignalKind> {
	connect(listener: SignalListener<K>): Subscription | void;
}

/** Host-supplied signal sources, keyed by kind. Missing kinds are never connected. */
export type SignalSources = { [K in SignalKind]?: SignalSource<K> };

// ─── Log Entry ────────────────────────────────────────────────────────────────

/** Orchestration phase identifiers */
export type LogPhase =
	| 'registry.init'
	| 'registry.duplicate'
	| 'unit.loaded'
	| 'unit.skipped'
	| 'unit.error'
	| 'unit.duplicate'
	| 'resolve.order'
	| 'resolve.external'
	| 'resolve.missing_dependency'
	| 'resolve.circular'
	| 'lifecycle.init'
	| 'lifecycle.skip'
	| 'lifecycle.error'
	| 'lifecycle.log'
	| 'signal.connect'
	| 'signal.error'
	| 'runtime.discover'
	| 'runtime.start'
	| 'runtime.shutdown';

/** Log severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Universal log entry: every logger receives this */
export interface LogEntry {
	/** ISO 8601 timestamp (UTC) */
	timestamp: string;
	/** Orchestration phase */
	phase: LogPhase;
	/** Controller unit name */
	unit?: string;
	/** Signal kind */
	signal?: SignalKind;
	/** Dependency name */
	dependency?: string;
	/** Execution context of the runtime */
	context?: ExecutionContext;
	/** Phase-specific result */
	result?: string;
	/** Phase duration in milliseconds */
	duration_ms?: number;
	/** Error message if applicable */
	error?: string;
	/** Additional context */
	metadata?: Record<string, unknown>;
}

// ─── Project Configuration ────────────────────────────────────────────────────

/** Logger definition (YAML) */
export interface LoggerDefinition {
	/** Logger name */
	name: string;
	/** Logger type (registration id, e.g. "console") */
	type: string;
	/** Logger-specific configuration */
	config?: Record<string, unknown>;
}

/** A discovery root as written in cadence.yaml */
export type DiscoveryRootEntry = string | { path: string; name?: string };

/** Root cadence.yaml project configuration */
export interface ProjectConfig {
	apiVersion: string;
	kind: 'Project';
	metadata: {
		name: string;
		description?: string;
	};
	context: ExecutionContext;
	discovery?: {
		shared_root?: string;
		roots?: DiscoveryRootEntry[];
	};
	controllers?: string[];
	defaults?: {
		priority?: number;
	};
	loggers?: LoggerDefinition[];
}

/** A resolved discovery root */
export interface DiscoveryRoot {
	/** Absolute directory path */
	path: string;
	/** Root node name (defaults to the directory's basename) */
	name?: string;
}

/** Fully resolved Cadence configuration: everything needed to boot */
export interface CadenceConfig {
	project: {
		name: string;
		description?: string;
	};
	context: ExecutionContext;
	discovery: {
		/** Root name indexed shallowly */
		sharedRoot: string;
		roots: DiscoveryRoot[];
	};
	/** Directories whose controllers are loaded, in order */
	controllers: string[];
	defaults: {
		priority: number;
	};
	loggers: LoggerDefinition[];
}

// ─── Runtime Status ───────────────────────────────────────────────────────────

/** Per-unit status as reported by the runtime */
export interface UnitStatus {
	name: string;
	priority: number | null;
	dependencies: string[];
	initialized: boolean;
	/** ISO 8601 timestamp of the init call, or null if never initialized */
	initTime: string | null;
	raw: boolean;
	connectedSignals: SignalKind[];
}

/** Runtime status information */
export interface RuntimeStatus {
	context: ExecutionContext;
	/** Number of names in the registry */
	discovered: number;
	/** Whether start() has completed at least once */
	running: boolean;
	units: UnitStatus[];
}

// ─── Utilities ────────────────────────────────────────────────────────────────

/** Duration string (e.g., "500ms", "1s", "5m") */
export type DurationString = string;

/** Parse a duration string to milliseconds */
export function parseDuration(duration: DurationString): number {
	const match = duration.match(/^(\d+)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(
			`Invalid duration format: "${duration}". Expected format: <number><unit> (e.g., 500ms, 1s, 5m)`,
		);
	}
	const value = Number.parseInt(match[1], 10);
	const unit = match[2];
	switch (unit) {
		case 'ms':
			return value;
		case 's':
			return value * 1000;
		case 'm':
			return value * 60 * 1000;
		case 'h':
			return value * 60 * 60 * 1000;
		case 'd':
			return value * 24 * 60 * 60 * 1000;
		default:
			throw new Error(`Unknown duration unit: ${unit}`);
	}
}
