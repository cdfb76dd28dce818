/**
 * Lifecycle runner: calls each controller's init hook once, in order.
 *
 * A unit is marked initialized before its hook runs, so a hook that throws
 * is never retried. Failures are reported per unit and never stop the
 * remaining units from initializing.
 */

import type { ControllerContext } from '@cadence/sdk';
import type { ControllerUnit } from './controller-unit.js';
import { errorMessage, InitHookError } from './errors.js';
import type { EmitLog } from './logger.js';

export interface LifecycleOptions {
	/** Build the capability object handed to a unit's init hook */
	makeContext: (unit: ControllerUnit) => ControllerContext;
	log: EmitLog;
	/** Clock used for initTime and durations (default: Date.now) */
	now?: () => number;
}

/** Names of the units handled by one runInit() call */
export interface InitSummary {
	initialized: string[];
	skipped: string[];
	failed: string[];
}

export function runInit(units: readonly ControllerUnit[], options: LifecycleOptions): InitSummary {
	const { makeContext, log } = options;
	const now = options.now ?? Date.now;
	const summary: InitSummary = { initialized: [], skipped: [], failed: [] };

	const report = (unit: ControllerUnit, err: unknown): void => {
		const error = new InitHookError(unit.name, `init failed: ${errorMessage(err)}`, { cause: err });
		log('lifecycle.error', { unit: unit.name, error: error.message });
	};

	for (const unit of units) {
		if (unit.initialized) continue;

		if (unit.raw) {
			log('lifecycle.skip', { unit: unit.name, result: 'raw unit' });
			summary.skipped.push(unit.name);
			continue;
		}

		unit.initialized = true;
		unit.initTime = now();

		if (!unit.hasInit) {
			log('lifecycle.init', { unit: unit.name, result: 'no init hook' });
			summary.initialized.push(unit.name);
			continue;
		}

		try {
			const result: unknown = unit.definition.init?.(makeContext(unit));
			if (result instanceof Promise) {
				void result.catch((err: unknown) => report(unit, err));
			}
		} catch (err) {
			report(unit, err);
			summary.failed.push(unit.name);
			continue;
		}

		log('lifecycle.init', {
			unit: unit.name,
			result: 'initialized',
			duration_ms: now() - unit.initTime,
		});
		summary.initialized.push(unit.name);
	}

	return summary;
}
