/**
 * Config dump types and parsing.
 *
 * Parsing path:
 *   JSON/YAML text -> parseConfigDump() -> ConfigDump
 *   ConfigDump.getListenerConfigDump() -> ListenersConfigDump
 *
 * Listener payloads stay raw here; decoding them is the extractor's job so a
 * bad payload is reported against the entry it came from.
 */

import {
	LEGACY_LISTENERS_DUMP_TYPE_URL,
	LISTENERS_DUMP_TYPE_URL,
	type TypedValue,
	field,
	isRecord,
	kindOf,
	toTypedValue,
} from "./any.ts";
import { PrimeError, RetrievalError } from "./errors.ts";

const LISTENERS_DUMP_TYPE_URLS: ReadonlySet<string> = new Set([
	LISTENERS_DUMP_TYPE_URL,
	LEGACY_LISTENERS_DUMP_TYPE_URL,
]);

// =====================================================================
// Listener section
// =====================================================================

/** One state of a dynamic listener. Only the payload is interpreted. */
export class ListenerState {
	constructor(
		readonly versionInfo: string,
		readonly listener: unknown,
	) {}
}

/** A listener received over the control channel. */
export class DynamicListener {
	constructor(
		readonly name: string,
		readonly activeState: ListenerState | null,
	) {}
}

/** A listener baked into bootstrap configuration. */
export class StaticListener {
	constructor(readonly listener: unknown) {}
}

export class ListenersConfigDump {
	constructor(
		readonly versionInfo: string,
		readonly dynamicListeners: readonly DynamicListener[],
		readonly staticListeners: readonly StaticListener[],
	) {}
}

// =====================================================================
// ConfigDump
// =====================================================================

/** A snapshot of a proxy's configuration: one type-tagged section per resource kind. */
export class ConfigDump {
	constructor(readonly configs: readonly TypedValue[]) {}

	/** Locate and shape-check the listener section. */
	getListenerConfigDump(): ListenersConfigDump {
		const section = this.configs.find((c) => LISTENERS_DUMP_TYPE_URLS.has(c.typeUrl));
		if (section === undefined) {
			throw new RetrievalError(
				`config dump has no configuration of type ${LISTENERS_DUMP_TYPE_URL}`,
			);
		}
		const obj = section.value;
		return new ListenersConfigDump(
			stringOrEmpty(field(obj, "version_info")),
			entries(obj, "dynamic_listeners").map(parseDynamicListener),
			entries(obj, "static_listeners").map(
				(entry) => new StaticListener(field(entry, "listener") ?? null),
			),
		);
	}
}

/** Validate the top-level shape of a decoded dump document. */
export function parseConfigDump(data: unknown): ConfigDump {
	if (!isRecord(data)) {
		throw new PrimeError(`expected object, got ${kindOf(data)}`);
	}
	const rawConfigs = field(data, "configs");
	if (rawConfigs === undefined || rawConfigs === null) return new ConfigDump([]);
	if (!Array.isArray(rawConfigs)) {
		throw new PrimeError(`'configs' must be an array, got ${kindOf(rawConfigs)}`);
	}
	const configs = rawConfigs.map((c: unknown, i) => {
		const typed = toTypedValue(c);
		if (typed === null) {
			throw new PrimeError(`configs[${i}] must be an object, got ${kindOf(c)}`);
		}
		return typed;
	});
	return new ConfigDump(configs);
}

function parseDynamicListener(entry: Readonly<Record<string, unknown>>): DynamicListener {
	const name = stringOrEmpty(field(entry, "name"));
	const state = field(entry, "active_state");
	if (state === undefined || state === null) return new DynamicListener(name, null);
	if (!isRecord(state)) {
		throw new RetrievalError(
			`dynamic listener "${name}": active_state must be an object, got ${kindOf(state)}`,
		);
	}
	return new DynamicListener(
		name,
		new ListenerState(stringOrEmpty(field(state, "version_info")), field(state, "listener") ?? null),
	);
}

function entries(
	obj: Readonly<Record<string, unknown>>,
	name: string,
): Readonly<Record<string, unknown>>[] {
	const list = field(obj, name);
	if (list === undefined || list === null) return [];
	if (!Array.isArray(list)) {
		throw new RetrievalError(`${name} must be an array, got ${kindOf(list)}`);
	}
	return list.map((entry: unknown, i) => {
		if (!isRecord(entry)) {
			throw new RetrievalError(`${name}[${i}] must be an object, got ${kindOf(entry)}`);
		}
		return entry;
	});
}

function stringOrEmpty(data: unknown): string {
	return typeof data === "string" ? data : "";
}
