/**
 * Filesystem unit trees.
 *
 * Directories become folder nodes and unit files become unit nodes named
 * after the file without its extension. A directory holding an index file
 * is itself a unit; its other entries are that unit's children. Entries
 * are visited in sorted order so discovery order does not depend on the
 * filesystem.
 *
 * Units evaluate synchronously through Node's require, so unit files must
 * be CommonJS (or JSON).
 */

import type { Dirent } from 'node:fs';
import { readdirSync } from 'node:fs';
import { createRequire } from 'node:module';
import { basename, extname, join, resolve } from 'node:path';
import type { UnitHandle, UnitNode } from '@cadence/sdk';

const requireUnit = createRequire(import.meta.url);

/** File extensions treated as units by default */
export const UNIT_EXTENSIONS: readonly string[] = ['.js', '.cjs', '.json'];

const INDEX_FILES: readonly string[] = ['index.js', 'index.cjs'];

export interface ScanOptions {
	/** Name of the root node (default: the directory's basename) */
	name?: string;
	/** File extensions treated as units */
	extensions?: readonly string[];
}

function unwrapDefault(value: unknown): unknown {
	if (
		typeof value === 'object' &&
		value !== null &&
		'__esModule' in value &&
		value.__esModule === true &&
		'default' in value
	) {
		return value.default;
	}
	return value;
}

function fileHandle(name: string, filePath: string): UnitHandle {
	return {
		name,
		path: filePath,
		load: () => {
			const exported: unknown = requireUnit(filePath);
			return unwrapDefault(exported);
		},
	};
}

function isVisible(entry: Dirent): boolean {
	return !entry.name.startsWith('.') && entry.name !== 'node_modules';
}

function byName(a: Dirent, b: Dirent): number {
	if (a.name < b.name) return -1;
	if (a.name > b.name) return 1;
	return 0;
}

function scan(dirPath: string, name: string, extensions: readonly string[]): UnitNode {
	const entries = readdirSync(dirPath, { withFileTypes: true }).filter(isVisible).sort(byName);
	const indexEntry = entries.find((e) => e.isFile() && INDEX_FILES.includes(e.name));
	const children: UnitNode[] = [];

	for (const entry of entries) {
		if (entry === indexEntry) continue;
		const entryPath = join(dirPath, entry.name);

		if (entry.isDirectory()) {
			children.push(scan(entryPath, entry.name, extensions));
			continue;
		}

		const ext = extname(entry.name);
		if (entry.isFile() && extensions.includes(ext)) {
			const unitName = basename(entry.name, ext);
			children.push({
				name: unitName,
				path: entryPath,
				handle: fileHandle(unitName, entryPath),
				children: [],
			});
		}
	}

	if (indexEntry) {
		return {
			name,
			path: dirPath,
			handle: fileHandle(name, join(dirPath, indexEntry.name)),
			children,
		};
	}
	return { name, path: dirPath, children };
}

/**
 * Build a unit tree from a directory. Throws if the directory cannot be read.
 */
export function scanDirectory(dir: string, options: ScanOptions = {}): UnitNode {
	const dirPath = resolve(dir);
	return scan(dirPath, options.name ?? basename(dirPath), options.extensions ?? UNIT_EXTENSIONS);
}

/** Find the node scanned from `path` in any of `roots` */
export function findNode(roots: readonly UnitNode[], path: string): UnitNode | undefined {
	const target = resolve(path);
	const search = (node: UnitNode): UnitNode | undefined => {
		if (node.path === target) return node;
		for (const child of node.children) {
			const found = search(child);
			if (found) return found;
		}
		return undefined;
	};
	for (const root of roots) {
		const found = search(root);
		if (found) return found;
	}
	return undefined;
}
