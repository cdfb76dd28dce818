/**
 * Loader: turns unit tree nodes into ControllerUnits.
 *
 * Each candidate is evaluated through the registry, checked against the
 * controller contract, filtered by execution context, and appended to the
 * collection. One unit's failure never stops the rest from loading.
 */

import type { ExecutionContext, UnitNode } from '@cadence/sdk';
import { descendants, isLoadable } from '@cadence/sdk';
import type { ControllerCollection } from './collection.js';
import { ControllerUnit, inspectController } from './controller-unit.js';
import { DuplicateNameError, errorMessage, InvalidControllerError } from './errors.js';
import type { EmitLog } from './logger.js';
import type { UnitRegistry } from './registry.js';

export interface LoaderOptions {
	registry: UnitRegistry;
	collection: ControllerCollection;
	context: ExecutionContext;
	log: EmitLog;
}

/** Names of the units handled by one loadModules() call */
export interface LoadSummary {
	loaded: string[];
	skipped: string[];
	failed: string[];
}

/**
 * Load controllers from a root node (every loadable unit nested below it)
 * or from an explicit list of nodes (taken as-is, non-units ignored).
 */
export function loadModules(source: UnitNode | UnitNode[], options: LoaderOptions): LoadSummary {
	const { registry, collection, context, log } = options;
	const candidates = Array.isArray(source) ? source : descendants(source);
	const summary: LoadSummary = { loaded: [], skipped: [], failed: [] };

	for (const node of candidates) {
		if (!isLoadable(node)) continue;

		let value: unknown;
		try {
			value = registry.evaluate(node.handle, node.name);
		} catch (err) {
			log('unit.error', { unit: node.name, error: errorMessage(err), metadata: { path: node.path } });
			summary.failed.push(node.name);
			continue;
		}

		const inspection = inspectController(value);
		if (!inspection.ok) {
			const error = new InvalidControllerError(node.name, inspection.errors);
			log('unit.error', { unit: node.name, error: error.message, metadata: { path: node.path } });
			summary.failed.push(node.name);
			continue;
		}

		const { definition } = inspection;

		if (definition.isServer !== undefined && definition.isServer !== (context === 'server')) {
			log('unit.skipped', {
				unit: node.name,
				context,
				result: definition.isServer ? 'server-only unit' : 'client-only unit',
			});
			summary.skipped.push(node.name);
			continue;
		}

		// The same evaluated value loaded again (e.g. a root loaded twice)
		if (collection.get(node.name)?.definition === definition) {
			log('unit.skipped', { unit: node.name, result: 'already loaded' });
			summary.skipped.push(node.name);
			continue;
		}

		const unit = new ControllerUnit({
			name: node.name,
			definition,
			loadOrder: collection.size,
			path: node.path,
		});
		const displaced = collection.add(unit);
		if (displaced) {
			const dup = new DuplicateNameError(
				node.name,
				`Duplicate controller name "${node.name}": ${node.path ?? node.name} replaces ${displaced.path ?? displaced.name} in the name index`,
			);
			log('unit.duplicate', { unit: node.name, error: dup.message });
		}

		log('unit.loaded', {
			unit: node.name,
			result: 'loaded',
			metadata: {
				path: node.path,
				priority: unit.priority,
				dependencies: [...unit.dependencies],
				signals: [...unit.signalKinds],
			},
		});
		summary.loaded.push(node.name);
	}

	return summary;
}
