/**
 * @cadence/sdk: Cadence Controller Development Kit
 *
 * Interfaces, helpers, and test harnesses for writing controllers,
 * loggers, and hosts on top of the Cadence core.
 */

// Core types
export type {
	ExecutionContext,
	InputObject,
	ActorRef,
	SignalArgs,
	SignalKind,
	SignalListener,
	SignalSource,
	SignalSources,
	Subscription,
	LogPhase,
	LogLevel,
	LogEntry,
	UnitStatus,
	RuntimeStatus,
	DurationString,
	LoggerDefinition,
	DiscoveryRootEntry,
	DiscoveryRoot,
	ProjectConfig,
	CadenceConfig,
} from './types.js';

export { SIGNAL_KINDS, CLIENT_ONLY_SIGNALS, parseDuration } from './types.js';

// Controller contract
export type { ControllerContext, ControllerDefinition, SignalHandlers } from './controller.js';
export { Priority, DEFAULT_PRIORITY, defineController, controllerSchema } from './controller.js';

// Unit trees
export type {
	UnitHandle,
	UnitNode,
	UnitTreeSpec,
	UnitTreeEntry,
	UnitFactory,
	UnitWithChildren,
} from './tree.js';
export { createUnitTree, descendants, isLoadable } from './tree.js';

// Logger interface
export type { Logger, LoggerRegistration } from './logger.js';

// Test harness
export {
	MockSignal,
	MockLogger,
	createMockSignals,
	createTestController,
} from './testing.js';
export type { MockSignals, TestController, TestControllerOptions } from './testing.js';
