/**
 * Builders for config dump documents, used in tests and benchmarks.
 *
 * They produce the JSON mapping a proxy's admin endpoint returns, not
 * decoded records, so everything built here still goes through the decoders.
 */

import {
	LISTENERS_DUMP_TYPE_URL,
	LISTENER_TYPE_URL,
	TYPE_URL_KEY,
	isRecord,
	toTypedValue,
} from "./any.ts";
import { BLACK_HOLE_CLUSTER, HTTP_CONNECTION_MANAGER, TCP_PROXY } from "./classify.ts";
import { type Listener, decodeListener } from "./listener.ts";

type Json = Record<string, unknown>;

const HCM_TYPE_URL =
	"type.googleapis.com/envoy.extensions.filters.network.http_connection_manager.v3.HttpConnectionManager";
const TCP_PROXY_TYPE_URL = "type.googleapis.com/envoy.extensions.filters.network.tcp_proxy.v3.TcpProxy";

/** An HTTP connection manager filter. */
export function httpFilter(statPrefix = "inbound_0.0.0.0_80"): Json {
	return {
		name: HTTP_CONNECTION_MANAGER,
		typed_config: { [TYPE_URL_KEY]: HCM_TYPE_URL, stat_prefix: statPrefix },
	};
}

/** A TCP proxy filter routing to `cluster`. */
export function tcpFilter(cluster: string): Json {
	return {
		name: TCP_PROXY,
		typed_config: { [TYPE_URL_KEY]: TCP_PROXY_TYPE_URL, stat_prefix: cluster, cluster },
	};
}

/** A TCP proxy filter routing to the black-hole cluster. */
export function blackHoleFilter(): Json {
	return tcpFilter(BLACK_HOLE_CLUSTER);
}

export interface ListenerShape {
	name?: string;
	address: string;
	port: number;
	/** One entry per filter chain. */
	chains: Json[][];
	typeUrl?: string;
}

/** A listener payload tagged with its type URL. */
export function listenerPayload(shape: ListenerShape): Json {
	return {
		[TYPE_URL_KEY]: shape.typeUrl ?? LISTENER_TYPE_URL,
		name: shape.name ?? `${shape.address}_${shape.port}`,
		address: { socket_address: { address: shape.address, port_value: shape.port } },
		filter_chains: shape.chains.map((filters) => ({ filters })),
	};
}

/** A decoded listener, built through the same decoder the extractor uses. */
export function buildListener(shape: ListenerShape): Listener {
	const payload = toTypedValue(listenerPayload(shape));
	if (payload === null) throw new Error("listener payload is not an object");
	return decodeListener(payload.withTypeUrl(LISTENER_TYPE_URL), shape.name ?? "test");
}

/** A whole config dump with one listener section. */
export function configDump(dynamic: readonly unknown[], statics: readonly unknown[] = []): Json {
	return {
		configs: [
			{
				[TYPE_URL_KEY]: LISTENERS_DUMP_TYPE_URL,
				version_info: "2024-01-01T00:00:00Z/1",
				dynamic_listeners: dynamic.map((listener) => ({
					name: isRecord(listener) && typeof listener.name === "string" ? listener.name : "",
					active_state: { version_info: "1", listener, last_updated: "2024-01-01T00:00:00Z" },
				})),
				static_listeners: statics.map((listener) => ({
					listener,
					last_updated: "2024-01-01T00:00:00Z",
				})),
			},
		],
	};
}
