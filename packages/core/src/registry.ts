/**
 * UnitRegistry: name → handle index built from discovery roots.
 *
 * The shared-packages root contributes only its direct loadable children;
 * every other root contributes all loadable units nested below it. A
 * later unit with a name already indexed replaces the earlier one with a
 * warning. Values are evaluated on first use and cached per handle.
 */

import type { UnitHandle, UnitNode } from '@cadence/sdk';
import { descendants, isLoadable } from '@cadence/sdk';
import {
	DuplicateNameError,
	EvaluationError,
	errorMessage,
	NotInitializedError,
	UnitNotFoundError,
} from './errors.js';
import type { EmitLog } from './logger.js';

/** Name of the root that is indexed shallowly unless configured otherwise */
export const DEFAULT_SHARED_ROOT = 'Packages';

export interface UnitRegistryOptions {
	/** Root name that receives shallow (direct children only) indexing */
	sharedRootName?: string;
	/** Log sink for duplicate and init entries */
	log?: EmitLog;
}

export class UnitRegistry {
	readonly sharedRootName: string;
	private handles = new Map<string, UnitHandle>();
	private readonly cache = new Map<UnitHandle, unknown>();
	private readonly evaluating = new Set<UnitHandle>();
	private initialized = false;
	private readonly log: EmitLog;

	constructor(options?: UnitRegistryOptions) {
		this.sharedRootName = options?.sharedRootName ?? DEFAULT_SHARED_ROOT;
		this.log = options?.log ?? (() => {});
	}

	/**
	 * Rebuild the index from `roots`. Replaces any previous index and
	 * drops every cached value.
	 */
	init(roots: readonly UnitNode[]): void {
		const handles = new Map<string, UnitHandle>();

		for (const root of roots) {
			const candidates = root.name === this.sharedRootName ? root.children : descendants(root);
			for (const node of candidates) {
				if (!isLoadable(node)) continue;

				const previous = handles.get(node.name);
				if (previous) {
					const dup = new DuplicateNameError(
						node.name,
						`Duplicate unit name "${node.name}": ${node.path ?? node.name} replaces ${previous.path ?? previous.name}`,
					);
					this.log('registry.duplicate', { unit: node.name, error: dup.message });
				}
				handles.set(node.name, node.handle);
			}
		}

		this.handles = handles;
		this.cache.clear();
		this.initialized = true;

		this.log('registry.init', {
			result: `indexed ${handles.size} units`,
			metadata: { roots: roots.map((r) => r.name), units: handles.size },
		});
	}

	/**
	 * Resolve a unit by name, evaluating it on first use.
	 * Throws NotInitializedError, UnitNotFoundError or EvaluationError.
	 */
	import(name: string): unknown {
		if (!this.initialized) {
			throw new NotInitializedError(`Cannot import "${name}": registry is not initialized`);
		}
		const handle = this.handles.get(name);
		if (!handle) {
			throw new UnitNotFoundError(name);
		}
		return this.evaluate(handle, name);
	}

	/**
	 * Evaluate a handle, sharing the cache with import(). Failed
	 * evaluations are not cached.
	 */
	evaluate(handle: UnitHandle, name: string = handle.name): unknown {
		if (this.cache.has(handle)) {
			return this.cache.get(handle);
		}
		if (this.evaluating.has(handle)) {
			throw new EvaluationError(name, 'Circular import while evaluating unit');
		}

		this.evaluating.add(handle);
		let value: unknown;
		try {
			value = handle.load();
		} catch (err) {
			if (err instanceof EvaluationError) throw err;
			throw new EvaluationError(name, `Failed to evaluate: ${errorMessage(err)}`, { cause: err });
		} finally {
			this.evaluating.delete(handle);
		}

		this.cache.set(handle, value);
		return value;
	}

	/** Check if a name is indexed. */
	has(name: string): boolean {
		return this.handles.has(name);
	}

	/** Get the handle indexed under a name. */
	get(name: string): UnitHandle | undefined {
		return this.handles.get(name);
	}

	/** List indexed names in discovery order. */
	names(): string[] {
		return [...this.handles.keys()];
	}

	get size(): number {
		return this.handles.size;
	}

	get isInitialized(): boolean {
		return this.initialized;
	}
}
