/**
 * Boot a Runtime from a resolved CadenceConfig.
 *
 * Loggers are created from their registrations first, so every later
 * phase (discovery, loading, ordering, init, signal connection) is logged.
 */

import type { ErrorObject } from 'ajv';
import AjvModule from 'ajv';

const Ajv = AjvModule.default ?? AjvModule;

import type {
	CadenceConfig,
	Logger,
	LoggerDefinition,
	LoggerRegistration,
	SignalSources,
	UnitNode,
} from '@cadence/sdk';
import { ConfigError, errorMessage, SchemaError } from './errors.js';
import { findNode, scanDirectory } from './fs-tree.js';
import { LoggerManager } from './logger.js';
import { Runtime } from './runtime.js';

export interface BootstrapOptions {
	/** Host signal sources */
	signals?: SignalSources;
	/** Logger registrations available to the config's `loggers` section */
	loggers?: LoggerRegistration[];
	/** Shared logger manager (default: new LoggerManager) */
	loggerManager?: LoggerManager;
}

const ajv = new Ajv({ allErrors: true });

async function createLogger(
	definition: LoggerDefinition,
	registrations: readonly LoggerRegistration[],
): Promise<Logger> {
	const registration = registrations.find((r) => r.id === definition.type);
	if (!registration) {
		throw new ConfigError(
			`Unknown logger type "${definition.type}" for logger "${definition.name}"`,
		);
	}

	const config = definition.config ?? {};
	if (registration.configSchema) {
		const validate = ajv.compile(registration.configSchema);
		if (!validate(config)) {
			const errors = (validate.errors ?? []).map(
				(e: ErrorObject) => `${e.instancePath || '/'}: ${e.message}`,
			);
			throw new SchemaError(`Invalid config for logger "${definition.name}"`, errors);
		}
	}

	const logger = new registration.logger();
	await logger.init(config);
	return logger;
}

function scanRoot(path: string, name?: string): UnitNode {
	try {
		return scanDirectory(path, { name });
	} catch (err) {
		throw new ConfigError(`Cannot read unit directory ${path}: ${errorMessage(err)}`, {
			cause: err,
		});
	}
}

/**
 * Create loggers, discover units, load the configured controller
 * directories, and start the runtime.
 */
export async function bootstrap(
	config: CadenceConfig,
	options: BootstrapOptions = {},
): Promise<Runtime> {
	const created: Logger[] = [];
	try {
		for (const definition of config.loggers) {
			created.push(await createLogger(definition, options.loggers ?? []));
		}
	} catch (err) {
		// Release the loggers built before the failure
		const partial = new LoggerManager();
		for (const logger of created) partial.addLogger(logger);
		await partial.shutdown();
		throw err;
	}

	const loggerManager = options.loggerManager ?? new LoggerManager();
	for (const logger of created) loggerManager.addLogger(logger);

	const runtime = new Runtime({
		context: config.context,
		sharedRootName: config.discovery.sharedRoot,
		defaultPriority: config.defaults.priority,
		signals: options.signals,
		loggerManager,
	});

	const roots = config.discovery.roots.map((root) => scanRoot(root.path, root.name));
	runtime.discover(roots);

	for (const path of config.controllers) {
		runtime.loadModules(findNode(roots, path) ?? scanRoot(path));
	}

	runtime.start();
	return runtime;
}
