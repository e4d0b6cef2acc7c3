import { LISTENER_TYPE_URL, kindOf, toTypedValue } from "./any.ts";
import type { ConfigDump } from "./dump.ts";
import { DecodeError, EmptyResultError, NotPrimedError } from "./errors.ts";
import { type Listener, decodeListener } from "./listener.ts";
import { logger } from "./log.ts";

const log = logger("extract");

/**
 * Decode every listener in the dump.
 *
 * Active dynamic listeners come first, then static ones, each in encounter
 * order; nothing is sorted. The first payload that fails to decode aborts the
 * whole extraction.
 */
export function extractListeners(dump: ConfigDump | null | undefined): Listener[] {
	if (dump === null || dump === undefined) {
		throw new NotPrimedError();
	}
	const section = dump.getListenerConfigDump();

	const listeners: Listener[] = [];
	section.dynamicListeners.forEach((entry, i) => {
		if (entry.activeState === null || isUnset(entry.activeState.listener)) return;
		listeners.push(
			decodeEntry(entry.activeState.listener, `dynamic_listeners[${i}].active_state.listener`),
		);
	});
	const dynamicCount = listeners.length;

	section.staticListeners.forEach((entry, i) => {
		if (isUnset(entry.listener)) return;
		listeners.push(decodeEntry(entry.listener, `static_listeners[${i}].listener`));
	});

	log("extracted %d dynamic and %d static listeners", dynamicCount, listeners.length - dynamicCount);
	if (listeners.length === 0) {
		throw new EmptyResultError();
	}
	return listeners;
}

/** Dumps may tag payloads with the v2 or the v3 listener type; both decode as v3. */
function decodeEntry(payload: unknown, location: string): Listener {
	const typed = toTypedValue(payload);
	if (typed === null) {
		throw new DecodeError(location, `listener payload must be an object, got ${kindOf(payload)}`);
	}
	return decodeListener(typed.withTypeUrl(LISTENER_TYPE_URL), location);
}

function isUnset(payload: unknown): boolean {
	return payload === null || payload === undefined;
}
