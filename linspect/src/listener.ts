/**
 * Decoded listener records.
 *
 * Only the members the inspector interprets are typed: the bound socket
 * address and the filter chains. Everything else in the payload is kept
 * verbatim in `raw` so that a dump reproduces the listener in full.
 */

import { LISTENER_TYPE_URL, TypedValue, field, isRecord, kindOf, toTypedValue } from "./any.ts";
import { DecodeError } from "./errors.ts";

const MAX_PORT_VALUE = 0xffff_ffff;

// =====================================================================
// Record types
// =====================================================================

export interface SocketAddress {
	readonly address: string;
	readonly portValue: number;
}

/** A named network filter with its opaque typed configuration. */
export class Filter {
	constructor(
		readonly name: string,
		readonly typedConfig: TypedValue | null = null,
	) {}

	/** Typed configuration as text; empty when the filter has none. */
	configText(): string {
		return this.typedConfig === null ? "" : this.typedConfig.text();
	}
}

export class FilterChain {
	constructor(readonly filters: readonly Filter[]) {}
}

export class Listener {
	constructor(
		readonly name: string,
		readonly address: SocketAddress | null,
		readonly filterChains: readonly FilterChain[],
		readonly raw: Readonly<Record<string, unknown>>,
	) {}

	toJSON(): Readonly<Record<string, unknown>> {
		return this.raw;
	}
}

/** Bound socket address, or "" when the listener is not bound to a socket. */
export function listenerAddress(l: Listener): string {
	return l.address?.address ?? "";
}

/** Bound port, or 0 when the listener is not bound to a socket. */
export function listenerPort(l: Listener): number {
	return l.address?.portValue ?? 0;
}

// =====================================================================
// Decoding
// =====================================================================

/**
 * Decode a listener payload.
 *
 * The payload must already carry the v3 listener type URL; callers normalize
 * older identifiers first. `location` names the entry in error messages.
 */
export function decodeListener(payload: TypedValue, location: string): Listener {
	if (payload.typeUrl !== LISTENER_TYPE_URL) {
		throw new DecodeError(
			location,
			`mismatched message type: got "${payload.typeUrl}", want "${LISTENER_TYPE_URL}"`,
		);
	}
	const obj = payload.value;

	const name = optionalString(field(obj, "name"), location, "name");
	const address = decodeAddress(field(obj, "address"), location);

	const rawChains = field(obj, "filter_chains");
	const chains: FilterChain[] = [];
	if (rawChains !== undefined && rawChains !== null) {
		if (!Array.isArray(rawChains)) {
			throw new DecodeError(location, `filter_chains must be an array, got ${kindOf(rawChains)}`);
		}
		rawChains.forEach((chain: unknown, i) => {
			chains.push(decodeFilterChain(chain, location, `filter_chains[${i}]`));
		});
	}

	return new Listener(name, address, chains, obj);
}

function decodeAddress(data: unknown, location: string): SocketAddress | null {
	if (data === undefined || data === null) return null;
	if (!isRecord(data)) {
		throw new DecodeError(location, `address must be an object, got ${kindOf(data)}`);
	}
	const socket = field(data, "socket_address");
	// pipe and internal addresses have no socket
	if (socket === undefined || socket === null) return null;
	if (!isRecord(socket)) {
		throw new DecodeError(
			location,
			`address.socket_address must be an object, got ${kindOf(socket)}`,
		);
	}
	return {
		address: optionalString(field(socket, "address"), location, "address.socket_address.address"),
		portValue: decodePort(field(socket, "port_value"), location),
	};
}

function decodePort(data: unknown, location: string): number {
	if (data === undefined || data === null) return 0;
	// the JSON mapping allows integers as decimal strings
	const port = typeof data === "string" && /^\d+$/.test(data) ? Number(data) : data;
	if (typeof port !== "number" || !Number.isInteger(port) || port < 0 || port > MAX_PORT_VALUE) {
		throw new DecodeError(
			location,
			`address.socket_address.port_value must be an unsigned 32-bit integer, got ${JSON.stringify(data)}`,
		);
	}
	return port;
}

function decodeFilterChain(data: unknown, location: string, path: string): FilterChain {
	if (!isRecord(data)) {
		throw new DecodeError(location, `${path} must be an object, got ${kindOf(data)}`);
	}
	const rawFilters = field(data, "filters");
	if (rawFilters === undefined || rawFilters === null) return new FilterChain([]);
	if (!Array.isArray(rawFilters)) {
		throw new DecodeError(location, `${path}.filters must be an array, got ${kindOf(rawFilters)}`);
	}
	return new FilterChain(
		rawFilters.map((f: unknown, i) => decodeFilter(f, location, `${path}.filters[${i}]`)),
	);
}

function decodeFilter(data: unknown, location: string, path: string): Filter {
	if (!isRecord(data)) {
		throw new DecodeError(location, `${path} must be an object, got ${kindOf(data)}`);
	}
	const name = optionalString(field(data, "name"), location, `${path}.name`);
	const rawConfig = field(data, "typed_config");
	if (rawConfig === undefined || rawConfig === null) return new Filter(name);

	const typedConfig = toTypedValue(rawConfig);
	if (typedConfig === null) {
		throw new DecodeError(
			location,
			`${path}.typed_config must be an object, got ${kindOf(rawConfig)}`,
		);
	}
	return new Filter(name, typedConfig);
}

function optionalString(data: unknown, location: string, path: string): string {
	if (data === undefined || data === null) return "";
	if (typeof data !== "string") {
		throw new DecodeError(location, `${path} must be a string, got ${kindOf(data)}`);
	}
	return data;
}
