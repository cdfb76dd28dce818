import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, SchemaError } from '../errors.js';
import { buildConfig, loadConfig } from '../schema.js';

let dir: string;

function writeConfig(content: string): string {
	const configPath = join(dir, 'cadence.yaml');
	writeFileSync(configPath, content);
	return configPath;
}

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), 'cadence-schema-'));
});

afterEach(() => {
	rmSync(dir, { recursive: true, force: true });
	delete process.env.CADENCE_TEST_ROOT;
});

describe('loadConfig', () => {
	it('loads a full project and resolves paths against the config file', async () => {
		const configPath = writeConfig(`
apiVersion: cadence/v1
kind: Project
metadata:
  name: my-game
  description: Test project
context: client
discovery:
  shared_root: Shared
  roots:
    - ./src/shared/Shared
    - path: ./src/client
      name: Client
controllers:
  - ./src/client/controllers
defaults:
  priority: 300
loggers:
  - name: console
    type: console
    config:
      level: info
`);

		const config = await loadConfig({ configPath });

		expect(config).toEqual({
			project: { name: 'my-game', description: 'Test project' },
			context: 'client',
			discovery: {
				sharedRoot: 'Shared',
				roots: [
					{ path: join(dir, 'src/shared/Shared') },
					{ path: join(dir, 'src/client'), name: 'Client' },
				],
			},
			controllers: [join(dir, 'src/client/controllers')],
			defaults: { priority: 300 },
			loggers: [{ name: 'console', type: 'console', config: { level: 'info' } }],
		});
	});

	it('fills in defaults for optional sections', async () => {
		const configPath = writeConfig(`
apiVersion: cadence/v1
kind: Project
metadata:
  name: minimal
context: server
`);

		const config = await loadConfig({ configPath });

		expect(config.discovery).toEqual({ sharedRoot: 'Packages', roots: [] });
		expect(config.controllers).toEqual([]);
		expect(config.defaults).toEqual({ priority: 500 });
		expect(config.loggers).toEqual([]);
	});

	it('keeps absolute paths as they are', async () => {
		const configPath = writeConfig(`
apiVersion: cadence/v1
kind: Project
metadata: { name: abs }
context: client
controllers: [/opt/game/controllers]
`);

		const config = await loadConfig({ configPath });

		expect(config.controllers).toEqual(['/opt/game/controllers']);
	});

	it('substitutes environment variables', async () => {
		process.env.CADENCE_TEST_ROOT = '/srv/game';
		const configPath = writeConfig(`
apiVersion: cadence/v1
kind: Project
metadata: { name: env }
context: client
discovery:
  roots: ["\${CADENCE_TEST_ROOT}/Packages"]
`);

		const config = await loadConfig({ configPath });

		expect(config.discovery.roots).toEqual([{ path: '/srv/game/Packages' }]);
	});

	it('rejects unset environment variables', async () => {
		const configPath = writeConfig(`
apiVersion: cadence/v1
kind: Project
metadata: { name: env }
context: client
controllers: ["\${CADENCE_TEST_ROOT}/controllers"]
`);

		await expect(loadConfig({ configPath })).rejects.toThrow(
			'Environment variable "CADENCE_TEST_ROOT" is not set',
		);
	});

	it('lists schema violations', async () => {
		const configPath = writeConfig(`
apiVersion: cadence/v1
kind: Project
metadata: { name: bad }
context: browser
defaults: { priority: 1.5 }
`);

		const error = await loadConfig({ configPath }).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(SchemaError);
		if (!(error instanceof SchemaError)) return;
		expect(error.message).toBe('Invalid project configuration');
		expect(error.validationErrors).toEqual([
			'/context: must be equal to one of the allowed values',
			'/defaults/priority: must be integer',
		]);
	});

	it('wraps unreadable files in ConfigError', async () => {
		const missing = join(dir, 'missing.yaml');

		await expect(loadConfig({ configPath: missing })).rejects.toThrow(ConfigError);
		await expect(loadConfig({ configPath: missing })).rejects.toThrow(
			`Failed to load YAML file: ${missing}`,
		);
	});
});

describe('buildConfig', () => {
	it('fills in every default', () => {
		expect(buildConfig({ project: { name: 'lib' }, context: 'client' })).toEqual({
			project: { name: 'lib' },
			context: 'client',
			discovery: { sharedRoot: 'Packages', roots: [] },
			controllers: [],
			defaults: { priority: 500 },
			loggers: [],
		});
	});

	it('keeps what it is given', () => {
		const config = buildConfig({
			project: { name: 'lib' },
			context: 'server',
			discovery: { sharedRoot: 'Shared' },
			defaults: { priority: 1 },
		});

		expect(config.discovery).toEqual({ sharedRoot: 'Shared', roots: [] });
		expect(config.defaults.priority).toBe(1);
	});
});
