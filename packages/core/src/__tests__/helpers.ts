/**
 * Shared fixtures for the core tests.
 */

import type { ControllerDefinition, LogPhase } from '@cadence/sdk';
import { ControllerUnit } from '../controller-unit.js';
import type { EmitLog, LogFields } from '../logger.js';

export type CapturedEntry = LogFields & { phase: LogPhase };

/** An EmitLog that records what it receives */
export function captureLog(): { entries: CapturedEntry[]; log: EmitLog } {
	const entries: CapturedEntry[] = [];
	const log: EmitLog = (phase, fields = {}) => {
		entries.push({ phase, ...fields });
	};
	return { entries, log };
}

export function phases(entries: readonly CapturedEntry[], phase: LogPhase): CapturedEntry[] {
	return entries.filter((e) => e.phase === phase);
}

let loadOrder = 0;

export function makeUnit(name: string, definition: ControllerDefinition = {}): ControllerUnit {
	return new ControllerUnit({ name, definition, loadOrder: loadOrder++ });
}

export function indexUnits(units: readonly ControllerUnit[]): Map<string, ControllerUnit> {
	return new Map(units.map((u) => [u.name, u]));
}
