/**
 * Tests for the Runtime: discovery, batched loading and the full start sequence.
 */

import type { ControllerContext } from '@cadence/sdk';
import {
	createMockSignals,
	createTestController,
	createUnitTree,
	MockLogger,
	MockSignal,
} from '@cadence/sdk';
import { describe, expect, it, vi } from 'vitest';
import { NotInitializedError } from '../errors.js';
import { LoggerManager } from '../logger.js';
import { Runtime } from '../runtime.js';

function createRuntime(context: 'client' | 'server' = 'client') {
	const logger = new MockLogger();
	const loggerManager = new LoggerManager();
	loggerManager.addLogger(logger);
	const signals = createMockSignals();
	const runtime = new Runtime({ context, loggerManager, signals });
	return { runtime, logger, signals };
}

const shared = createUnitTree('Packages', {
	Signal: () => ({ kind: 'signal-lib' }),
});

describe('Runtime', () => {
	it('runs the full start sequence', () => {
		const { runtime, signals } = createRuntime();
		const seen: string[] = [];
		const input = createTestController({
			priority: 100,
			onInit: (ctx) => seen.push(ctx.name),
		});
		const camera = createTestController({
			priority: 50,
			dependencies: ['Input'],
			onInit: (ctx) => seen.push(ctx.name),
			signals: { update: vi.fn() },
		});

		runtime.discover([shared]);
		runtime.loadModules(createUnitTree('Controllers', { Input: () => input, Camera: () => camera }));
		const order = runtime.start();

		expect(order).toEqual(['Input', 'Camera']);
		expect(seen).toEqual(['Input', 'Camera']);
		expect(runtime.getOrder()).toEqual(['Input', 'Camera']);

		signals.update.fire(0.5);
		expect(camera.signals?.update).toHaveBeenCalledWith(0.5);
	});

	it('gives init hooks the import capability', () => {
		const { runtime } = createRuntime();
		let imported: unknown;
		const controller = createTestController({
			onInit: (ctx) => {
				imported = ctx.import('Signal');
			},
		});

		runtime.discover([shared]);
		runtime.loadModules(createUnitTree('Controllers', { Uses: () => controller }));
		runtime.start();

		expect(imported).toEqual({ kind: 'signal-lib' });
		expect(runtime.import('Signal')).toBe(imported);
	});

	it('lets init hooks reach other controllers', () => {
		const { runtime } = createRuntime();
		const audio = createTestController({ priority: 1 });
		let found: unknown;
		const ui = createTestController({
			onInit: (ctx) => {
				found = ctx.getController('Audio');
			},
		});

		runtime.discover([shared]);
		runtime.loadModules(createUnitTree('Controllers', { Ui: () => ui, Audio: () => audio }));
		runtime.start();

		expect(found).toBe(audio);
		expect(runtime.getController('Missing')).toBeUndefined();
	});

	it('routes controller log lines through the loggers', async () => {
		const { runtime, logger } = createRuntime();
		const controller = createTestController({
			onInit: (ctx: ControllerContext) => ctx.log('warn', 'assets missing', { count: 2 }),
		});

		runtime.loadModules(createUnitTree('Controllers', { Loader: () => controller }));
		runtime.start();
		await runtime.loggerManager.flush();

		expect(logger.byPhase('lifecycle.log')[0]).toMatchObject({
			unit: 'Loader',
			context: 'client',
			result: 'assets missing',
			metadata: { count: 2, level: 'warn' },
		});
	});

	it('throws from import() before discovery', () => {
		const { runtime } = createRuntime();

		expect(() => runtime.import('Signal')).toThrow(NotInitializedError);
	});

	it('initializes and connects only new units on a later start', () => {
		const { runtime, signals } = createRuntime();
		const first = createTestController({ signals: { update: vi.fn() } });
		const second = createTestController({ dependencies: ['First'], signals: { update: vi.fn() } });

		runtime.discover([shared]);
		runtime.loadModules(createUnitTree('Batch1', { First: () => first }));
		expect(runtime.start()).toEqual(['First']);

		runtime.loadModules(createUnitTree('Batch2', { Second: () => second }));
		expect(runtime.start()).toEqual(['Second']);

		expect(first.initCalls).toHaveLength(1);
		expect(second.initCalls).toHaveLength(1);
		expect(signals.update.connectCount).toBe(2);
		expect(runtime.getOrder()).toEqual(['First', 'Second']);
	});

	it('does nothing on a start with no new units', () => {
		const { runtime } = createRuntime();
		const controller = createTestController();

		runtime.loadModules(createUnitTree('Controllers', { A: () => controller }));
		runtime.start();

		expect(runtime.start()).toEqual([]);
		expect(controller.initCalls).toHaveLength(1);
	});

	it('connects sources supplied after start', () => {
		const runtime = new Runtime({ context: 'client' });
		const update = vi.fn();
		runtime.loadModules(createUnitTree('Controllers', { A: () => ({ signals: { update } }) }));
		runtime.start();

		const source = new MockSignal('update');
		expect(runtime.connectSignals({ update: source })).toBe(1);
		source.fire(2);

		expect(update).toHaveBeenCalledWith(2);
	});

	it('never connects client-only signals on the server', () => {
		const { runtime, signals } = createRuntime('server');

		runtime.loadModules(
			createUnitTree('Controllers', {
				Spawner: () => ({ signals: { localCharacterAdded: vi.fn(), actorJoined: vi.fn() } }),
			}),
		);
		runtime.start();

		expect(signals.localCharacterAdded.listenerCount).toBe(0);
		expect(signals.actorJoined.listenerCount).toBe(1);
	});

	it('reports status for every loaded unit', () => {
		const { runtime } = createRuntime();
		const controller = createTestController({ priority: 7, signals: { inputBegan: vi.fn() } });

		runtime.discover([shared]);
		runtime.loadModules(createUnitTree('Controllers', { A: () => controller, Raw: () => ({ raw: true }) }));

		expect(runtime.status().running).toBe(false);
		runtime.start();

		const status = runtime.status();
		expect(status.context).toBe('client');
		expect(status.discovered).toBe(1);
		expect(status.running).toBe(true);
		expect(status.units.map((u) => [u.name, u.initialized, u.connectedSignals])).toEqual([
			['A', true, ['inputBegan']],
			['Raw', false, []],
		]);
		expect(status.units[0].priority).toBe(7);
		expect(status.units[1].priority).toBe(500);
	});

	it('logs each phase with the runtime context', async () => {
		const { runtime, logger } = createRuntime('server');

		runtime.discover([shared]);
		runtime.loadModules(createUnitTree('Controllers', { A: () => createTestController() }));
		runtime.start();
		await runtime.shutdown();

		expect(logger.entries.map((e) => e.phase)).toEqual([
			'registry.init',
			'runtime.discover',
			'unit.loaded',
			'resolve.order',
			'lifecycle.init',
			'runtime.start',
			'runtime.shutdown',
		]);
		expect(logger.entries.every((e) => e.context === 'server')).toBe(true);
		expect(logger.byPhase('runtime.start')[0].metadata).toEqual({
			order: ['A'],
			initialized: 1,
			skipped: 0,
			failed: 0,
			signals: 0,
		});
	});

	it('flushes and shuts down loggers', async () => {
		const { runtime, logger } = createRuntime();

		await runtime.shutdown();

		expect(logger.flushCount).toBe(1);
		expect(logger.shutdownCalled).toBe(true);
		expect(runtime.status().running).toBe(false);
	});
});
