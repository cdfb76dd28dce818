/**
 * ControllerUnit: a loaded controller plus the bookkeeping the runtime
 * keeps for it.
 *
 * The controller's shape is checked once, at load time, and the result
 * (init hook present, raw flag, handled signal kinds) is cached here so
 * later phases never re-inspect the definition.
 */

import type { ControllerDefinition, SignalKind, UnitStatus } from '@cadence/sdk';
import { controllerSchema, SIGNAL_KINDS } from '@cadence/sdk';
import type { ErrorObject } from 'ajv';
import AjvModule from 'ajv';

const Ajv = AjvModule.default ?? AjvModule;

const ajv = new Ajv({ allErrors: true });
const validateShape = ajv.compile(controllerSchema);

// ─── Shape Inspection ────────────────────────────────────────────────────────

export type InspectionResult =
	| { ok: true; definition: ControllerDefinition }
	| { ok: false; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function functionErrors(value: Record<string, unknown>): string[] {
	const errors: string[] = [];
	if (value.init !== undefined && typeof value.init !== 'function') {
		errors.push('/init: must be a function');
	}
	const signals = value.signals;
	if (isRecord(signals)) {
		for (const [kind, handler] of Object.entries(signals)) {
			if (typeof handler !== 'function') {
				errors.push(`/signals/${kind}: must be a function`);
			}
		}
	}
	return errors;
}

function isControllerDefinition(value: unknown): value is ControllerDefinition {
	return isRecord(value) && validateShape(value) && functionErrors(value).length === 0;
}

/**
 * Check an evaluated unit against the controller contract.
 */
export function inspectController(value: unknown): InspectionResult {
	if (isControllerDefinition(value)) {
		return { ok: true, definition: value };
	}
	if (!isRecord(value)) {
		return { ok: false, errors: [`/: must be an object, got ${describeValue(value)}`] };
	}
	const schemaErrors = (validateShape.errors ?? []).map(
		(e: ErrorObject) => `${e.instancePath || '/'}: ${e.message}`,
	);
	return { ok: false, errors: [...schemaErrors, ...functionErrors(value)] };
}

function describeValue(value: unknown): string {
	if (value === null) return 'null';
	if (Array.isArray(value)) return 'array';
	return typeof value;
}

// ─── ControllerUnit ──────────────────────────────────────────────────────────

export interface ControllerUnitOptions {
	/** Name from the unit's handle */
	name: string;
	definition: ControllerDefinition;
	/** Position in discovery order */
	loadOrder: number;
	/** Where the unit came from */
	path?: string;
}

export class ControllerUnit {
	readonly name: string;
	readonly definition: ControllerDefinition;
	readonly loadOrder: number;
	readonly path?: string;

	/** Declared priority; the resolver fills in the default when absent */
	priority: number | undefined;
	readonly dependencies: readonly string[];
	readonly raw: boolean;
	readonly hasInit: boolean;
	/** Signal kinds the definition declares a handler for */
	readonly signalKinds: readonly SignalKind[];

	// Lifecycle bookkeeping
	initialized = false;
	initTime: number | null = null;
	readonly connectedSignals = new Set<SignalKind>();

	constructor(options: ControllerUnitOptions) {
		const { definition } = options;
		this.name = options.name;
		this.definition = definition;
		this.loadOrder = options.loadOrder;
		this.path = options.path;

		this.priority = definition.priority;
		this.dependencies = [...(definition.dependencies ?? [])];
		this.raw = definition.raw === true;
		this.hasInit = typeof definition.init === 'function';
		this.signalKinds = SIGNAL_KINDS.filter((kind) => typeof definition.signals?.[kind] === 'function');
	}

	status(): UnitStatus {
		return {
			name: this.name,
			priority: this.priority ?? null,
			dependencies: [...this.dependencies],
			initialized: this.initialized,
			initTime: this.initTime === null ? null : new Date(this.initTime).toISOString(),
			raw: this.raw,
			connectedSignals: SIGNAL_KINDS.filter((kind) => this.connectedSignals.has(kind)),
		};
	}
}
