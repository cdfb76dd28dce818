/**
 * Dependency/priority resolution.
 *
 * Units are stable-sorted by ascending priority, then visited depth-first
 * so that every declared dependency lands before its dependent. A unit
 * reached again while it is still being visited closes a cycle: the cycle
 * is reported once and the walk backs out, leaving that branch in
 * best-effort order. Missing dependencies are reported and ignored.
 */

import { DEFAULT_PRIORITY } from '@cadence/sdk';
import type { ControllerUnit } from './controller-unit.js';
import { CircularDependencyError, errorMessage, MissingDependencyError } from './errors.js';
import type { EmitLog } from './logger.js';
import type { UnitRegistry } from './registry.js';

export interface ResolveOptions {
	/** Priority for units that declare none (default: 500) */
	defaultPriority?: number;
	/** Last-resort lookup for dependencies that are not loaded controllers */
	registry?: UnitRegistry;
	/** Units already placed by an earlier call; treated as satisfied */
	resolved?: ReadonlySet<ControllerUnit>;
	log?: EmitLog;
}

/**
 * Compute the initialization order of `units`.
 *
 * Every input unit appears exactly once. `byName` is consulted first for
 * each dependency name; names it lacks are tried against the registry.
 */
export function resolveOrder(
	units: readonly ControllerUnit[],
	byName: ReadonlyMap<string, ControllerUnit>,
	options: ResolveOptions = {},
): ControllerUnit[] {
	const defaultPriority = options.defaultPriority ?? DEFAULT_PRIORITY;
	const log: EmitLog = options.log ?? (() => {});
	const { registry } = options;

	for (const unit of units) {
		if (unit.priority === undefined) {
			unit.priority = defaultPriority;
		}
	}

	// Array.prototype.sort is stable: equal priorities keep load order
	const sorted = [...units].sort(
		(a, b) => (a.priority ?? defaultPriority) - (b.priority ?? defaultPriority),
	);

	const inputs = new Set(units);
	const order: ControllerUnit[] = [];
	const ordered = new Set<ControllerUnit>(options.resolved);
	const visiting = new Set<ControllerUnit>();
	const path: ControllerUnit[] = [];

	const resolveExternal = (unit: ControllerUnit, dependency: string): void => {
		if (registry) {
			try {
				registry.import(dependency);
				log('resolve.external', {
					unit: unit.name,
					dependency,
					result: 'resolved through registry',
				});
				return;
			} catch (err) {
				const missing = new MissingDependencyError(unit.name, dependency, { cause: err });
				log('resolve.missing_dependency', {
					unit: unit.name,
					dependency,
					error: `${missing.message}: ${errorMessage(err)}`,
				});
				return;
			}
		}
		const missing = new MissingDependencyError(unit.name, dependency);
		log('resolve.missing_dependency', { unit: unit.name, dependency, error: missing.message });
	};

	const visit = (unit: ControllerUnit): void => {
		if (ordered.has(unit)) return;

		if (visiting.has(unit)) {
			const cycle = [...path.slice(path.indexOf(unit)), unit].map((u) => u.name);
			const error = new CircularDependencyError(cycle);
			log('resolve.circular', { unit: unit.name, error: error.message, metadata: { cycle } });
			return;
		}

		visiting.add(unit);
		path.push(unit);

		for (const dependency of unit.dependencies) {
			const dep = byName.get(dependency);
			if (dep) {
				visit(dep);
			} else {
				resolveExternal(unit, dependency);
			}
		}

		path.pop();
		visiting.delete(unit);
		ordered.add(unit);
		if (inputs.has(unit)) {
			order.push(unit);
		}
	};

	for (const unit of sorted) {
		visit(unit);
	}

	log('resolve.order', {
		result: `${order.length} units ordered`,
		metadata: { order: order.map((u) => u.name) },
	});

	return order;
}
