import type { Listener } from "./listener.ts";
import { ContainsMatcher, ExactMatcher } from "./matchers.ts";

/** Filter name of the HTTP connection manager; its presence marks HTTP traffic. */
export const HTTP_CONNECTION_MANAGER = "envoy.http_connection_manager";

/** Filter name of the TCP proxy; its presence marks TCP traffic. */
export const TCP_PROXY = "envoy.tcp_proxy";

/**
 * Fallback cluster the control plane injects when no route matches.
 * A TCP proxy pointing at it is plumbing, not a user-facing TCP service.
 */
export const BLACK_HOLE_CLUSTER = "BlackHoleCluster";

export const LISTENER_TYPES = ["HTTP", "TCP", "HTTP+TCP", "UNKNOWN"] as const;

export type ListenerType = (typeof LISTENER_TYPES)[number];

const isHttpFilter = new ExactMatcher(HTTP_CONNECTION_MANAGER);
const isTcpFilter = new ExactMatcher(TCP_PROXY);
const pointsAtBlackHole = new ContainsMatcher(BLACK_HOLE_CLUSTER);

/**
 * Classify a listener by the network filters in its chains.
 *
 * Filters with other names are ignored, so a listener built from filters
 * outside this set comes out as UNKNOWN.
 */
export function classifyListener(l: Listener): ListenerType {
	let nHttp = 0;
	let nTcp = 0;
	for (const chain of l.filterChains) {
		for (const filter of chain.filters) {
			if (isHttpFilter.matches(filter.name)) {
				nHttp++;
			} else if (isTcpFilter.matches(filter.name)) {
				if (!pointsAtBlackHole.matches(filter.configText())) nTcp++;
			}
		}
	}

	if (nHttp > 0) return nTcp === 0 ? "HTTP" : "HTTP+TCP";
	if (nTcp > 0) return "TCP";
	return "UNKNOWN";
}
