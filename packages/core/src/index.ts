/**
 * @cadence/core: Cadence orchestration core
 *
 * Public API exports for library mode.
 */

// Runtime
export { Runtime } from './runtime.js';
export type { RuntimeOptions } from './runtime.js';
export { bootstrap } from './bootstrap.js';
export type { BootstrapOptions } from './bootstrap.js';

// Config loading
export { loadConfig, buildConfig, validateProjectConfig } from './schema.js';
export type { LoadConfigOptions } from './schema.js';

// Errors
export {
	CadenceError,
	ConfigError,
	SchemaError,
	NotInitializedError,
	UnitNotFoundError,
	EvaluationError,
	InvalidControllerError,
	DuplicateNameError,
	CircularDependencyError,
	MissingDependencyError,
	InitHookError,
	SignalHandlerError,
	errorMessage,
} from './errors.js';

// Module registry
export { UnitRegistry, DEFAULT_SHARED_ROOT } from './registry.js';
export type { UnitRegistryOptions } from './registry.js';

// Controllers
export { ControllerUnit, inspectController } from './controller-unit.js';
export type { ControllerUnitOptions, InspectionResult } from './controller-unit.js';
export { ControllerCollection } from './collection.js';

// Orchestration phases
export { loadModules } from './loader.js';
export type { LoaderOptions, LoadSummary } from './loader.js';
export { resolveOrder } from './resolver.js';
export type { ResolveOptions } from './resolver.js';
export { runInit } from './lifecycle.js';
export type { LifecycleOptions, InitSummary } from './lifecycle.js';
export { connectSignals, isSignalAvailable } from './signals.js';
export type { ConnectOptions } from './signals.js';

// Filesystem discovery
export { scanDirectory, findNode, UNIT_EXTENSIONS } from './fs-tree.js';
export type { ScanOptions } from './fs-tree.js';

// Logger manager
export { LoggerManager } from './logger.js';
export type { EmitLog, LogFields } from './logger.js';
