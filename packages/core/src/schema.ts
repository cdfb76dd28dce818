/**
 * YAML config loading + JSON Schema validation.
 *
 * Loads cadence.yaml, resolves ${} env vars, validates against schema,
 * and returns a fully resolved CadenceConfig.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import type { ErrorObject } from 'ajv';
import AjvModule from 'ajv';
import yaml from 'js-yaml';

const Ajv = AjvModule.default ?? AjvModule;

import type {
	CadenceConfig,
	DiscoveryRoot,
	DiscoveryRootEntry,
	ProjectConfig,
} from '@cadence/sdk';
import { DEFAULT_PRIORITY } from '@cadence/sdk';
import { ConfigError, SchemaError } from './errors.js';
import { DEFAULT_SHARED_ROOT } from './registry.js';

// ─── JSON Schema for project config ──────────────────────────────────────────

const projectSchema = {
	type: 'object',
	required: ['apiVersion', 'kind', 'metadata', 'context'],
	properties: {
		apiVersion: { type: 'string' },
		kind: { const: 'Project' },
		metadata: {
			type: 'object',
			required: ['name'],
			properties: {
				name: { type: 'string' },
				description: { type: 'string' },
			},
		},
		context: { enum: ['client', 'server'] },
		discovery: {
			type: 'object',
			properties: {
				shared_root: { type: 'string', minLength: 1 },
				roots: {
					type: 'array',
					items: {
						anyOf: [
							{ type: 'string', minLength: 1 },
							{
								type: 'object',
								required: ['path'],
								properties: {
									path: { type: 'string', minLength: 1 },
									name: { type: 'string', minLength: 1 },
								},
								additionalProperties: false,
							},
						],
					},
				},
			},
			additionalProperties: false,
		},
		controllers: { type: 'array', items: { type: 'string', minLength: 1 } },
		defaults: {
			type: 'object',
			properties: {
				priority: { type: 'integer' },
			},
		},
		loggers: {
			type: 'array',
			items: {
				type: 'object',
				required: ['name', 'type'],
				properties: {
					name: { type: 'string' },
					type: { type: 'string' },
					config: { type: 'object' },
				},
			},
		},
	},
};

const ajv = new Ajv({ allErrors: true });
const validateProject = ajv.compile<ProjectConfig>(projectSchema);

// ─── Env var substitution ─────────────────────────────────────────────────────

function substituteEnvVars(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			const envVal = process.env[varName];
			if (envVal === undefined) {
				throw new ConfigError(`Environment variable "${varName}" is not set`);
			}
			return envVal;
		});
	}
	if (Array.isArray(value)) {
		return value.map(substituteEnvVars);
	}
	if (value !== null && typeof value === 'object') {
		const result: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			result[k] = substituteEnvVars(v);
		}
		return result;
	}
	return value;
}

// ─── YAML file loader ─────────────────────────────────────────────────────────

async function loadYamlFile(filePath: string): Promise<unknown> {
	try {
		const content = await readFile(filePath, 'utf-8');
		const parsed = yaml.load(content);
		return substituteEnvVars(parsed);
	} catch (err) {
		if (err instanceof ConfigError) throw err;
		throw new ConfigError(`Failed to load YAML file: ${filePath}`, { cause: err });
	}
}

// ─── Path resolution ──────────────────────────────────────────────────────────

function resolvePath(basePath: string, path: string): string {
	return isAbsolute(path) ? path : resolve(basePath, path);
}

function resolveRoot(basePath: string, entry: DiscoveryRootEntry): DiscoveryRoot {
	if (typeof entry === 'string') {
		return { path: resolvePath(basePath, entry) };
	}
	return { path: resolvePath(basePath, entry.path), name: entry.name };
}

// ─── Public API ───────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
	/** Path to cadence.yaml */
	configPath: string;
}

/**
 * Validate a parsed project document. Throws SchemaError listing every
 * violation as `instancePath: message`.
 */
export function validateProjectConfig(raw: unknown): ProjectConfig {
	if (!validateProject(raw)) {
		const errors = (validateProject.errors ?? []).map(
			(e: ErrorObject) => `${e.instancePath || '/'}: ${e.message}`,
		);
		throw new SchemaError('Invalid project configuration', errors);
	}
	return raw;
}

/**
 * Load and validate a Cadence configuration from YAML.
 * Relative paths resolve against the directory holding the config file.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<CadenceConfig> {
	const configPath = resolve(options.configPath);
	const basePath = dirname(configPath);

	const project = validateProjectConfig(await loadYamlFile(configPath));

	return {
		project: {
			name: project.metadata.name,
			description: project.metadata.description,
		},
		context: project.context,
		discovery: {
			sharedRoot: project.discovery?.shared_root ?? DEFAULT_SHARED_ROOT,
			roots: (project.discovery?.roots ?? []).map((entry) => resolveRoot(basePath, entry)),
		},
		controllers: (project.controllers ?? []).map((path) => resolvePath(basePath, path)),
		defaults: {
			priority: project.defaults?.priority ?? DEFAULT_PRIORITY,
		},
		loggers: project.loggers ?? [],
	};
}

/**
 * Build a CadenceConfig programmatically (for library/testing use).
 */
export function buildConfig(
	partial: Partial<Omit<CadenceConfig, 'discovery' | 'defaults'>> & {
		project: CadenceConfig['project'];
		context: CadenceConfig['context'];
		discovery?: Partial<CadenceConfig['discovery']>;
		defaults?: Partial<CadenceConfig['defaults']>;
	},
): CadenceConfig {
	return {
		project: partial.project,
		context: partial.context,
		discovery: {
			sharedRoot: partial.discovery?.sharedRoot ?? DEFAULT_SHARED_ROOT,
			roots: partial.discovery?.roots ?? [],
		},
		controllers: partial.controllers ?? [],
		defaults: {
			priority: partial.defaults?.priority ?? DEFAULT_PRIORITY,
		},
		loggers: partial.loggers ?? [],
	};
}
