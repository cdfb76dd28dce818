/**
 * Controller types for Cadence.
 *
 * A controller is a self-contained unit of game logic: it may declare a
 * priority, the names of controllers it depends on, an init hook, and
 * handlers for host signals. Everything else on it belongs to the controller.
 */

import type { ExecutionContext, LogLevel, SignalKind, SignalListener } from './types.js';

// ─── Priority ─────────────────────────────────────────────────────────────────

/** Named priority levels. Lower values initialize earlier. */
export const Priority = {
	Highest: 1,
	High: 250,
	Normal: 500,
	Low: 750,
	Lowest: 1000,
} as const;

/** Priority assigned to controllers that declare none */
export const DEFAULT_PRIORITY: number = Priority.Normal;

// ─── Controller Contract ──────────────────────────────────────────────────────

/** Handlers a controller declares, keyed by signal kind */
export type SignalHandlers = { [K in SignalKind]?: SignalListener<K> };

/** Capabilities handed to a controller's init hook */
export interface ControllerContext {
	/** Name the controller was loaded under */
	readonly name: string;
	/** Execution context of the runtime */
	readonly context: ExecutionContext;
	/**
	 * Resolve a discovered unit by name.
	 * Throws NotInitializedError, UnitNotFoundError or EvaluationError.
	 */
	import(name: string): unknown;
	/** Get another loaded controller by name */
	getController(name: string): ControllerDefinition | undefined;
	/** Write a log line attributed to this controller */
	log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void;
}

/** What a loadable unit must look like to take part in orchestration */
export interface ControllerDefinition {
	/** Initialization priority (nominal range 1–1000, default 500) */
	priority?: number;
	/** Names of controllers that must initialize before this one */
	dependencies?: string[];
	/** Restrict the controller to the server (true) or the client (false) */
	isServer?: boolean;
	/** Opt out of the init hook entirely */
	raw?: boolean;
	/** Called once, in resolved order */
	init?(ctx: ControllerContext): void | Promise<void>;
	/** Host signal handlers */
	signals?: SignalHandlers;
	/** Controller-owned state and methods */
	[member: string]: unknown;
}

/**
 * Identity helper that type-checks a controller definition while keeping
 * its own members visible to callers.
 */
export function defineController<T extends ControllerDefinition>(definition: T): T {
	return definition;
}

// ─── Controller JSON Schema ───────────────────────────────────────────────────

/** JSON Schema for the declarative part of a controller definition */
export const controllerSchema = {
	type: 'object',
	properties: {
		priority: { type: 'integer' },
		dependencies: { type: 'array', items: { type: 'string', minLength: 1 } },
		isServer: { type: 'boolean' },
		raw: { type: 'boolean' },
		signals: {
			type: 'object',
			propertyNames: {
				enum: [
					'update',
					'inputBegan',
					'inputEnded',
					'actorJoined',
					'actorLeaving',
					'localCharacterAdded',
					'localCharacterRemoving',
				],
			},
		},
	},
} as const;
