import { describe, expect, it } from "vitest";

import { LEGACY_LISTENERS_DUMP_TYPE_URL, LISTENERS_DUMP_TYPE_URL } from "../src/any.ts";
import { ConfigDump, DynamicListener, StaticListener, parseConfigDump } from "../src/dump.ts";
import { PrimeError, RetrievalError } from "../src/errors.ts";

function section(members: Record<string, unknown>, typeUrl = LISTENERS_DUMP_TYPE_URL) {
	return parseConfigDump({ configs: [{ "@type": typeUrl, ...members }] }).getListenerConfigDump();
}

describe("parseConfigDump", () => {
	it("reads each config as a typed value", () => {
		const dump = parseConfigDump({
			configs: [
				{ "@type": "type.googleapis.com/envoy.admin.v3.BootstrapConfigDump", bootstrap: {} },
				{ "@type": LISTENERS_DUMP_TYPE_URL },
			],
		});
		expect(dump.configs.map((c) => c.typeUrl)).toEqual([
			"type.googleapis.com/envoy.admin.v3.BootstrapConfigDump",
			LISTENERS_DUMP_TYPE_URL,
		]);
		expect(dump.configs[0]?.value).toEqual({ bootstrap: {} });
	});

	it("treats a document without configs as an empty dump", () => {
		expect(parseConfigDump({}).configs).toEqual([]);
	});

	it.each([
		[null, "expected object, got null"],
		[[], "expected object, got array"],
		[{ configs: {} }, "'configs' must be an array, got object"],
		[{ configs: [7] }, "configs[0] must be an object, got number"],
	])("rejects %j", (data, reason) => {
		expect(() => parseConfigDump(data)).toThrow(PrimeError);
		expect(() => parseConfigDump(data)).toThrow(`error unmarshalling config dump: ${reason}`);
	});
});

describe("ConfigDump.getListenerConfigDump", () => {
	it("fails when there is no listener section", () => {
		const dump = new ConfigDump([]);
		expect(() => dump.getListenerConfigDump()).toThrow(RetrievalError);
		expect(() => dump.getListenerConfigDump()).toThrow(
			`listener dump: config dump has no configuration of type ${LISTENERS_DUMP_TYPE_URL}`,
		);
	});

	it("accepts the v2alpha section type", () => {
		const s = section({ version_info: "v1" }, LEGACY_LISTENERS_DUMP_TYPE_URL);
		expect(s.versionInfo).toBe("v1");
		expect(s.dynamicListeners).toEqual([]);
		expect(s.staticListeners).toEqual([]);
	});

	it("reads dynamic and static entries in both spellings", () => {
		const listener = { name: "l" };
		const snake = section({
			dynamic_listeners: [{ name: "a", active_state: { version_info: "3", listener } }, { name: "b" }],
			static_listeners: [{ listener }, {}],
		});
		const camel = section({
			dynamicListeners: [{ name: "a", activeState: { versionInfo: "3", listener } }, { name: "b" }],
			staticListeners: [{ listener }, {}],
		});
		for (const s of [snake, camel]) {
			expect(s.dynamicListeners).toHaveLength(2);
			expect(s.dynamicListeners[0]).toBeInstanceOf(DynamicListener);
			expect(s.dynamicListeners[0]?.name).toBe("a");
			expect(s.dynamicListeners[0]?.activeState?.versionInfo).toBe("3");
			expect(s.dynamicListeners[0]?.activeState?.listener).toBe(listener);
			expect(s.dynamicListeners[1]?.activeState).toBeNull();
			expect(s.staticListeners[0]).toBeInstanceOf(StaticListener);
			expect(s.staticListeners[0]?.listener).toBe(listener);
			expect(s.staticListeners[1]?.listener).toBeNull();
		}
	});

	it.each([
		[{ dynamic_listeners: "x" }, "dynamic_listeners must be an array, got string"],
		[{ static_listeners: [[]] }, "static_listeners[0] must be an object, got array"],
		[
			{ dynamic_listeners: [{ name: "a", active_state: 1 }] },
			'dynamic listener "a": active_state must be an object, got number',
		],
	])("rejects section %j", (members, reason) => {
		expect(() => section(members)).toThrow(new RetrievalError(reason).message);
	});
});
