/**
 * Signal connector: subscribes controller handlers to host signals.
 *
 * Each (unit, signal kind) pair is connected at most once; the kind is
 * recorded on the unit once its handler has been handed to the source,
 * whether or not the source returns a subscription handle. Handlers are
 * wrapped so a throw or a rejected promise is reported and never reaches
 * the host's dispatch loop.
 */

import type {
	ExecutionContext,
	SignalHandlers,
	SignalKind,
	SignalSources,
	Subscription,
} from '@cadence/sdk';
import { CLIENT_ONLY_SIGNALS, SIGNAL_KINDS } from '@cadence/sdk';
import type { ControllerUnit } from './controller-unit.js';
import { errorMessage, SignalHandlerError } from './errors.js';
import type { EmitLog } from './logger.js';

export interface ConnectOptions {
	context: ExecutionContext;
	log: EmitLog;
}

type Listener<A extends unknown[]> = (...args: A) => void;

/** Wraps a handler into a listener that never throws */
type Guard = <A extends unknown[]>(handler: Listener<A>) => Listener<A>;

interface Connectable<A extends unknown[]> {
	connect(listener: Listener<A>): Subscription | void;
}

/** Returns whether the handler was passed to the source */
function bind<A extends unknown[]>(
	source: Connectable<A> | undefined,
	handler: Listener<A> | undefined,
	guard: Guard,
): boolean {
	if (!source || !handler) return false;
	source.connect(guard(handler));
	return true;
}

type Binder = (sources: SignalSources, handlers: SignalHandlers, guard: Guard) => boolean;

// One entry per kind keeps each source paired with the handler of the same kind
const BINDERS: Record<SignalKind, Binder> = {
	update: (s, h, guard) => bind(s.update, h.update, guard),
	inputBegan: (s, h, guard) => bind(s.inputBegan, h.inputBegan, guard),
	inputEnded: (s, h, guard) => bind(s.inputEnded, h.inputEnded, guard),
	actorJoined: (s, h, guard) => bind(s.actorJoined, h.actorJoined, guard),
	actorLeaving: (s, h, guard) => bind(s.actorLeaving, h.actorLeaving, guard),
	localCharacterAdded: (s, h, guard) => bind(s.localCharacterAdded, h.localCharacterAdded, guard),
	localCharacterRemoving: (s, h, guard) =>
		bind(s.localCharacterRemoving, h.localCharacterRemoving, guard),
};

function guardFor(unit: ControllerUnit, kind: SignalKind, log: EmitLog): Guard {
	const report = (err: unknown): void => {
		const error = new SignalHandlerError(unit.name, kind, errorMessage(err), { cause: err });
		log('signal.error', { unit: unit.name, signal: kind, error: error.message });
	};

	return <A extends unknown[]>(handler: Listener<A>): Listener<A> =>
		(...args: A): void => {
			try {
				const result: unknown = handler(...args);
				if (result instanceof Promise) {
					void result.catch(report);
				}
			} catch (err) {
				report(err);
			}
		};
}

/** Whether a signal kind can be connected in the given context */
export function isSignalAvailable(kind: SignalKind, context: ExecutionContext): boolean {
	return context === 'client' || !CLIENT_ONLY_SIGNALS.has(kind);
}

/**
 * Connect every declared, not yet connected handler of `units` to the
 * matching source in `sources`. Returns the number of new subscriptions.
 */
export function connectSignals(
	units: readonly ControllerUnit[],
	sources: SignalSources,
	options: ConnectOptions,
): number {
	const { context, log } = options;
	let connected = 0;

	for (const kind of SIGNAL_KINDS) {
		if (!isSignalAvailable(kind, context) || !sources[kind]) continue;

		for (const unit of units) {
			const handlers = unit.definition.signals;
			if (!handlers || !unit.signalKinds.includes(kind) || unit.connectedSignals.has(kind)) {
				continue;
			}

			let bound: boolean;
			try {
				bound = BINDERS[kind](sources, handlers, guardFor(unit, kind, log));
			} catch (err) {
				log('signal.error', {
					unit: unit.name,
					signal: kind,
					error: `Failed to connect: ${errorMessage(err)}`,
				});
				continue;
			}
			if (!bound) continue;

			unit.connectedSignals.add(kind);
			connected++;
			log('signal.connect', { unit: unit.name, signal: kind, result: 'connected' });
		}
	}

	return connected;
}
