/**
 * Unit trees: the discovery input for the registry and the loader.
 *
 * A tree is made of named nodes. A node that carries a handle is a loadable
 * unit; a node without one is a plain folder. Units may have children of
 * their own.
 */

/** Reference to a unit that has not been evaluated yet */
export interface UnitHandle {
	/** Declared name of the unit */
	readonly name: string;
	/** Where the unit came from (file path or virtual path) */
	readonly path?: string;
	/** Evaluate the unit and return its value. May throw. */
	load(): unknown;
}

/** A node in a unit tree */
export interface UnitNode {
	readonly name: string;
	readonly path?: string;
	/** Present iff the node is a loadable unit */
	readonly handle?: UnitHandle;
	readonly children: readonly UnitNode[];
}

/** Whether a node is a loadable unit */
export function isLoadable(node: UnitNode): node is UnitNode & { handle: UnitHandle } {
	return node.handle !== undefined;
}

/** Every node below `node`, depth-first, pre-order, children in tree order */
export function descendants(node: UnitNode): UnitNode[] {
	const result: UnitNode[] = [];
	const walk = (current: UnitNode) => {
		for (const child of current.children) {
			result.push(child);
			walk(child);
		}
	};
	walk(node);
	return result;
}

// ─── In-memory Trees ──────────────────────────────────────────────────────────

/**
 * Declarative in-memory tree spec.
 *
 * - a function is a unit evaluated by calling it
 * - `{ $unit: () => value, children?: {...} }` is a unit with children
 * - any other object is a folder whose keys are child names
 */
export type UnitTreeSpec = { [name: string]: UnitTreeEntry };

export type UnitFactory = () => unknown;

export interface UnitWithChildren {
	$unit: UnitFactory;
	children?: UnitTreeSpec;
}

export type UnitTreeEntry = UnitFactory | UnitWithChildren | UnitTreeSpec;

function isUnitWithChildren(entry: UnitTreeEntry): entry is UnitWithChildren {
	return typeof entry === 'object' && typeof entry.$unit === 'function';
}

function buildNode(name: string, entry: UnitTreeEntry, parentPath: string): UnitNode {
	const path = `${parentPath}/${name}`;
	if (typeof entry === 'function') {
		return { name, path, handle: { name, path, load: entry }, children: [] };
	}
	if (isUnitWithChildren(entry)) {
		return {
			name,
			path,
			handle: { name, path, load: entry.$unit },
			children: buildChildren(entry.children ?? {}, path),
		};
	}
	return { name, path, children: buildChildren(entry, path) };
}

function buildChildren(spec: UnitTreeSpec, parentPath: string): UnitNode[] {
	return Object.entries(spec).map(([name, entry]) => buildNode(name, entry, parentPath));
}

/**
 * Build a folder node from a declarative spec.
 *
 * @example
 * ```ts
 * const shared = createUnitTree('Packages', {
 *     Signal: () => SignalLib,
 *     Promise: { $unit: () => PromiseLib, children: { Util: () => util } },
 * });
 * ```
 */
export function createUnitTree(name: string, spec: UnitTreeSpec): UnitNode {
	return { name, path: name, children: buildChildren(spec, name) };
}
