/**
 * ControllerCollection: loaded controllers in load order, plus a
 * name index over the same units.
 *
 * Adding a unit whose name is already indexed replaces the index entry
 * but keeps the earlier unit in the ordered list, so both are ordered and
 * initialized while lookups by name see only the later one.
 */

import type { ControllerUnit } from './controller-unit.js';

export class ControllerCollection {
	private readonly ordered: ControllerUnit[] = [];
	private readonly byName = new Map<string, ControllerUnit>();

	/**
	 * Append a unit. Returns the unit it displaced from the name index,
	 * if any.
	 */
	add(unit: ControllerUnit): ControllerUnit | undefined {
		const displaced = this.byName.get(unit.name);
		this.ordered.push(unit);
		this.byName.set(unit.name, unit);
		return displaced;
	}

	/** Get the unit indexed under a name. */
	get(name: string): ControllerUnit | undefined {
		return this.byName.get(name);
	}

	/** Check if a name is indexed. */
	has(name: string): boolean {
		return this.byName.has(name);
	}

	/** All units in load order, duplicates included. */
	list(): ControllerUnit[] {
		return [...this.ordered];
	}

	/** The name index, read-only. */
	index(): ReadonlyMap<string, ControllerUnit> {
		return this.byName;
	}

	/** Number of units in load order. */
	get size(): number {
		return this.ordered.length;
	}
}
