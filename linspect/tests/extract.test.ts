import { describe, expect, it } from "vitest";

import { LEGACY_LISTENER_TYPE_URL } from "../src/any.ts";
import { ConfigDump, parseConfigDump } from "../src/dump.ts";
import {
	DecodeError,
	EmptyResultError,
	NotPrimedError,
	RetrievalError,
} from "../src/errors.ts";
import { extractListeners } from "../src/extract.ts";
import { listenerAddress, listenerPort } from "../src/listener.ts";
import { configDump, httpFilter, listenerPayload, tcpFilter } from "../src/testing.ts";

const web = listenerPayload({ address: "10.0.0.1", port: 8080, chains: [[httpFilter()]] });
const db = listenerPayload({ address: "10.0.0.2", port: 9000, chains: [[tcpFilter("db")]] });

function extract(dump: unknown) {
	return extractListeners(parseConfigDump(dump));
}

function endpoints(dump: unknown): string[] {
	return extract(dump).map((l) => `${listenerAddress(l)}:${listenerPort(l)}`);
}

describe("extractListeners", () => {
	it("fails when no dump was supplied", () => {
		expect(() => extractListeners(null)).toThrow(NotPrimedError);
		expect(() => extractListeners(undefined)).toThrow("config writer has not been primed");
	});

	it("fails with EmptyResult when both sections are empty", () => {
		expect(() => extract(configDump([], []))).toThrow(EmptyResultError);
		expect(() => extract(configDump([], []))).toThrow("no listeners found");
	});

	it("fails with a retrieval error when the listener section is missing", () => {
		expect(() => extractListeners(new ConfigDump([]))).toThrow(RetrievalError);
	});

	it("puts dynamic listeners before static ones", () => {
		expect(endpoints(configDump([web], [db]))).toEqual(["10.0.0.1:8080", "10.0.0.2:9000"]);
		expect(endpoints(configDump([db], [web]))).toEqual(["10.0.0.2:9000", "10.0.0.1:8080"]);
	});

	it("keeps encounter order instead of sorting", () => {
		const late = listenerPayload({ address: "10.0.0.9", port: 1, chains: [] });
		const early = listenerPayload({ address: "10.0.0.0", port: 65000, chains: [] });
		expect(endpoints(configDump([late, early], [db, web]))).toEqual([
			"10.0.0.9:1",
			"10.0.0.0:65000",
			"10.0.0.2:9000",
			"10.0.0.1:8080",
		]);
	});

	it("decodes v2-tagged payloads like v3 ones", () => {
		const legacy = listenerPayload({
			address: "10.0.0.3",
			port: 15001,
			chains: [],
			typeUrl: LEGACY_LISTENER_TYPE_URL,
		});
		expect(endpoints(configDump([legacy], [legacy]))).toEqual(["10.0.0.3:15001", "10.0.0.3:15001"]);
	});

	it("decodes payloads with any declared type", () => {
		const odd = listenerPayload({ address: "10.0.0.4", port: 80, chains: [], typeUrl: "example.com/Other" });
		expect(endpoints(configDump([odd]))).toEqual(["10.0.0.4:80"]);
	});

	it("does not mutate the declared type of the input", () => {
		const legacy = listenerPayload({
			address: "10.0.0.3",
			port: 80,
			chains: [],
			typeUrl: LEGACY_LISTENER_TYPE_URL,
		});
		extract(configDump([legacy]));
		expect(legacy["@type"]).toBe(LEGACY_LISTENER_TYPE_URL);
	});

	it("skips dynamic entries without an active listener", () => {
		const dump = {
			configs: [
				{
					"@type": "type.googleapis.com/envoy.admin.v3.ListenersConfigDump",
					dynamic_listeners: [
						{ name: "warming", warming_state: { listener: db } },
						{ name: "no-listener", active_state: { version_info: "1" } },
						{ name: "web", active_state: { listener: web } },
					],
					static_listeners: [{ last_updated: "2024-01-01T00:00:00Z" }, { listener: db }],
				},
			],
		};
		expect(endpoints(dump)).toEqual(["10.0.0.1:8080", "10.0.0.2:9000"]);
	});

	it("aborts on the first payload that is not an object", () => {
		expect(() => extract(configDump([web, "oops"]))).toThrow(
			"unmarshal listener: dynamic_listeners[1].active_state.listener: listener payload must be an object, got string",
		);
	});

	it("aborts when the last static entry is corrupt", () => {
		const corrupt = { ...db, filter_chains: 7 };
		expect(() => extract(configDump([web], [db, corrupt]))).toThrow(DecodeError);
		expect(() => extract(configDump([web], [db, corrupt]))).toThrow(
			"unmarshal listener: static_listeners[1].listener: filter_chains must be an array, got number",
		);
	});
});
