import { describe, expect, it } from "vitest";

import { TypedValue, field, toTypedValue } from "../src/any.ts";

describe("toTypedValue", () => {
	it("splits the type URL from the payload", () => {
		const typed = toTypedValue({ "@type": "type.googleapis.com/X", a: 1, b: { c: 2 } });
		expect(typed?.typeUrl).toBe("type.googleapis.com/X");
		expect(typed?.value).toEqual({ a: 1, b: { c: 2 } });
	});

	it("uses the empty type URL when @type is missing or not a string", () => {
		expect(toTypedValue({ a: 1 })?.typeUrl).toBe("");
		expect(toTypedValue({ "@type": 3, a: 1 })?.typeUrl).toBe("");
	});

	it.each([null, undefined, "x", 3, []])("returns null for %j", (data) => {
		expect(toTypedValue(data)).toBeNull();
	});
});

describe("TypedValue", () => {
	it("withTypeUrl copies without touching the original", () => {
		const original = new TypedValue("old", { a: 1 });
		const copy = original.withTypeUrl("new");
		expect(copy.typeUrl).toBe("new");
		expect(copy.value).toBe(original.value);
		expect(original.typeUrl).toBe("old");
	});

	it("text renders the payload only", () => {
		expect(new TypedValue("type.googleapis.com/X", { cluster: "c" }).text()).toBe('{"cluster":"c"}');
	});

	it("serializes back to the JSON mapping", () => {
		expect(JSON.stringify(new TypedValue("u", { a: 1 }))).toBe('{"@type":"u","a":1}');
	});
});

describe("field", () => {
	it("reads the snake_case name", () => {
		expect(field({ port_value: 80 }, "port_value")).toBe(80);
	});

	it("falls back to the lowerCamelCase name", () => {
		expect(field({ portValue: 80 }, "port_value")).toBe(80);
		expect(field({ filterChains: [] }, "filter_chains")).toEqual([]);
	});

	it("prefers the snake_case name when both are present", () => {
		expect(field({ port_value: 1, portValue: 2 }, "port_value")).toBe(1);
	});

	it("returns undefined for a missing member", () => {
		expect(field({}, "port_value")).toBeUndefined();
	});

	it("never reads inherited properties", () => {
		expect(field({}, "to_string")).toBeUndefined();
		expect(field({}, "constructor")).toBeUndefined();
		expect(field({}, "__proto__")).toBeUndefined();
	});
});
