/**
 * Error taxonomy for Cadence.
 *
 * Every error in the system extends CadenceError, giving callers
 * a consistent shape to catch and inspect. Warning-level errors
 * (duplicates, cycles, missing dependencies) are never thrown; the
 * runtime formats them into log entries.
 */

export class CadenceError extends Error {
	readonly code: string;

	constructor(code: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'CadenceError';
		this.code = code;
	}
}

export class ConfigError extends CadenceError {
	constructor(message: string, options?: ErrorOptions) {
		super('CONFIG_ERROR', message, options);
		this.name = 'ConfigError';
	}
}

export class SchemaError extends CadenceError {
	readonly validationErrors: string[];

	constructor(message: string, validationErrors: string[] = [], options?: ErrorOptions) {
		super('SCHEMA_ERROR', message, options);
		this.name = 'SchemaError';
		this.validationErrors = validationErrors;
	}
}

export class NotInitializedError extends CadenceError {
	constructor(message = 'Registry is not initialized; call discover() first', options?: ErrorOptions) {
		super('NOT_INITIALIZED', message, options);
		this.name = 'NotInitializedError';
	}
}

export class UnitNotFoundError extends CadenceError {
	readonly unitName: string;

	constructor(unitName: string, message?: string, options?: ErrorOptions) {
		super('UNIT_NOT_FOUND', message ?? `Unit not found: ${unitName}`, options);
		this.name = 'UnitNotFoundError';
		this.unitName = unitName;
	}
}

export class EvaluationError extends CadenceError {
	readonly unitName: string;

	constructor(unitName: string, message: string, options?: ErrorOptions) {
		super('EVALUATION_ERROR', `[${unitName}] ${message}`, options);
		this.name = 'EvaluationError';
		this.unitName = unitName;
	}
}

export class InvalidControllerError extends CadenceError {
	readonly unitName: string;
	readonly validationErrors: string[];

	constructor(unitName: string, validationErrors: string[], options?: ErrorOptions) {
		super(
			'INVALID_CONTROLLER',
			`[${unitName}] Invalid controller: ${validationErrors.join(', ')}`,
			options,
		);
		this.name = 'InvalidControllerError';
		this.unitName = unitName;
		this.validationErrors = validationErrors;
	}
}

export class DuplicateNameError extends CadenceError {
	readonly unitName: string;

	constructor(unitName: string, message?: string, options?: ErrorOptions) {
		super('DUPLICATE_NAME', message ?? `Duplicate unit name: ${unitName}`, options);
		this.name = 'DuplicateNameError';
		this.unitName = unitName;
	}
}

export class CircularDependencyError extends CadenceError {
	/** Unit names along the cycle, starting and ending with the same name */
	readonly cycle: string[];

	constructor(cycle: string[], options?: ErrorOptions) {
		super('CIRCULAR_DEPENDENCY', `Circular dependency: ${cycle.join(' -> ')}`, options);
		this.name = 'CircularDependencyError';
		this.cycle = cycle;
	}
}

export class MissingDependencyError extends CadenceError {
	readonly unitName: string;
	readonly dependency: string;

	constructor(unitName: string, dependency: string, options?: ErrorOptions) {
		super(
			'MISSING_DEPENDENCY',
			`[${unitName}] Dependency "${dependency}" could not be resolved`,
			options,
		);
		this.name = 'MissingDependencyError';
		this.unitName = unitName;
		this.dependency = dependency;
	}
}

export class InitHookError extends CadenceError {
	readonly unitName: string;

	constructor(unitName: string, message: string, options?: ErrorOptions) {
		super('INIT_HOOK_ERROR', `[${unitName}] ${message}`, options);
		this.name = 'InitHookError';
		this.unitName = unitName;
	}
}

export class SignalHandlerError extends CadenceError {
	readonly unitName: string;
	readonly signal: string;

	constructor(unitName: string, signal: string, message: string, options?: ErrorOptions) {
		super('SIGNAL_HANDLER_ERROR', `[${unitName}/${signal}] ${message}`, options);
		this.name = 'SignalHandlerError';
		this.unitName = unitName;
		this.signal = signal;
	}
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
