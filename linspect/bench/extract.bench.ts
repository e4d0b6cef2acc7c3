/**
 * Extraction and classification benchmarks.
 *
 * Measures the per-listener hot path: decoding, classifying and filtering a
 * sidecar-sized dump, and how it scales with listener count.
 *
 * Run: npx tsx linspect/bench/extract.bench.ts
 */

import { bench, run, summary } from "mitata";

import {
	ListenerFilter,
	classifyListener,
	extractListeners,
	parseConfigDump,
} from "../src/index.ts";
import {
	blackHoleFilter,
	buildListener,
	configDump,
	httpFilter,
	listenerPayload,
	tcpFilter,
} from "../src/testing.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

function sidecarDump(n: number): Record<string, unknown> {
	const dynamic: Record<string, unknown>[] = [];
	for (let i = 0; i < n; i++) {
		const filter = i % 3 === 0 ? httpFilter() : i % 3 === 1 ? tcpFilter(`c${i}`) : blackHoleFilter();
		const chains = [[filter]];
		dynamic.push(listenerPayload({ address: `10.0.${i >> 8}.${i & 255}`, port: 8000 + i, chains }));
	}
	return configDump(dynamic, [listenerPayload({ address: "0.0.0.0", port: 15090, chains: [] })]);
}

// ── Classification ───────────────────────────────────────────────────────────

summary(() => {
	const http = buildListener({ address: "0.0.0.0", port: 80, chains: [[httpFilter()]] });
	const mixed = buildListener({
		address: "0.0.0.0",
		port: 15006,
		chains: [[httpFilter()], [tcpFilter("passthrough")], [blackHoleFilter()]],
	});

	bench("classify_http", () => classifyListener(http));
	bench("classify_mixed_with_black_hole", () => classifyListener(mixed));
});

// ── Extraction scaling ───────────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 100, 1000]) {
		const dump = parseConfigDump(sidecarDump(n));
		bench(`extract_${n}_listeners`, () => extractListeners(dump));
	}
});

// ── Filtering ────────────────────────────────────────────────────────────────

summary(() => {
	const listeners = extractListeners(parseConfigDump(sidecarDump(500)));
	const empty = new ListenerFilter();
	const byPort = new ListenerFilter({ port: 8250 });
	const byType = new ListenerFilter({ type: "TCP" });

	bench("filter_empty_500", () => empty.apply(listeners));
	bench("filter_port_500", () => byPort.apply(listeners));
	bench("filter_type_500", () => byType.apply(listeners));
});

await run();
