import { describe, expect, it } from 'vitest';
import { createUnitTree, descendants, isLoadable } from '../tree.js';

describe('createUnitTree', () => {
	it('builds folders, units, and units with children', () => {
		const value = { tag: 'util' };
		const tree = createUnitTree('Shared', {
			Signal: () => 'signal',
			Folder: {
				Inner: () => 'inner',
			},
			Promise: { $unit: () => 'promise', children: { Util: () => value } },
		});

		expect(tree.name).toBe('Shared');
		expect(isLoadable(tree)).toBe(false);
		expect(tree.children.map((c) => c.name)).toEqual(['Signal', 'Folder', 'Promise']);

		const [signal, folder, promise] = tree.children;
		expect(isLoadable(signal)).toBe(true);
		expect(signal.handle?.load()).toBe('signal');
		expect(isLoadable(folder)).toBe(false);
		expect(folder.children[0].handle?.load()).toBe('inner');
		expect(promise.handle?.load()).toBe('promise');
		expect(promise.children[0].handle?.load()).toBe(value);
	});

	it('assigns slash-separated virtual paths', () => {
		const tree = createUnitTree('Root', { A: { B: () => 1 } });

		expect(tree.path).toBe('Root');
		expect(tree.children[0].path).toBe('Root/A');
		expect(tree.children[0].children[0].path).toBe('Root/A/B');
		expect(tree.children[0].children[0].handle?.path).toBe('Root/A/B');
	});

	it('does not evaluate units while building', () => {
		let calls = 0;
		createUnitTree('Root', {
			A: () => {
				calls++;
				return {};
			},
		});
		expect(calls).toBe(0);
	});
});

describe('descendants', () => {
	it('walks depth-first in pre-order', () => {
		const tree = createUnitTree('Root', {
			A: { $unit: () => 'a', children: { A1: () => 'a1' } },
			B: { B1: { B2: () => 'b2' } },
			C: () => 'c',
		});

		expect(descendants(tree).map((n) => n.name)).toEqual(['A', 'A1', 'B', 'B1', 'B2', 'C']);
	});

	it('returns an empty list for a leaf', () => {
		const tree = createUnitTree('Empty', {});
		expect(descendants(tree)).toEqual([]);
	});
});
