/**
 * Type-tagged values in their protobuf JSON mapping.
 *
 * An `Any` serializes as an object whose `@type` member carries the type URL
 * and whose remaining members are the payload:
 *
 *   { "@type": "type.googleapis.com/envoy.config.listener.v3.Listener", "name": "..." }
 */

export const TYPE_URL_KEY = "@type";

// =====================================================================
// Type URLs
// =====================================================================

export const LISTENER_TYPE_URL = "type.googleapis.com/envoy.config.listener.v3.Listener";
export const LEGACY_LISTENER_TYPE_URL = "type.googleapis.com/envoy.api.v2.Listener";

export const LISTENERS_DUMP_TYPE_URL = "type.googleapis.com/envoy.admin.v3.ListenersConfigDump";
export const LEGACY_LISTENERS_DUMP_TYPE_URL =
	"type.googleapis.com/envoy.admin.v2alpha.ListenersConfigDump";

// =====================================================================
// TypedValue
// =====================================================================

/** A decoded `Any`: type URL plus the payload members. Never mutated. */
export class TypedValue {
	constructor(
		readonly typeUrl: string,
		readonly value: Readonly<Record<string, unknown>>,
	) {}

	/** Same payload under another type URL. */
	withTypeUrl(typeUrl: string): TypedValue {
		return new TypedValue(typeUrl, this.value);
	}

	/** Payload as text, without the type URL. */
	text(): string {
		return JSON.stringify(this.value);
	}

	toJSON(): Record<string, unknown> {
		return { [TYPE_URL_KEY]: this.typeUrl, ...this.value };
	}
}

/** Plain object check shared by every decoder. */
export function isRecord(data: unknown): data is Record<string, unknown> {
	return typeof data === "object" && data !== null && !Array.isArray(data);
}

/** Human-readable kind of a JSON value, for error messages. */
export function kindOf(data: unknown): string {
	if (data === null) return "null";
	if (Array.isArray(data)) return "array";
	return typeof data;
}

/**
 * Read an object as a TypedValue. Returns null for anything but an object.
 * A missing or non-string `@type` yields the empty type URL.
 */
export function toTypedValue(data: unknown): TypedValue | null {
	if (!isRecord(data)) return null;
	const { [TYPE_URL_KEY]: typeUrl, ...value } = data;
	return new TypedValue(typeof typeUrl === "string" ? typeUrl : "", value);
}

// =====================================================================
// Field access
// =====================================================================

function lowerCamel(snakeName: string): string {
	return snakeName.replace(/_([a-z0-9])/g, (_m, c: string) => c.toUpperCase());
}

/**
 * Read a member by its proto field name.
 *
 * The JSON mapping allows both the original snake_case name and its
 * lowerCamelCase form; the original name wins when both are present.
 * Inherited properties are never read.
 */
export function field(obj: Readonly<Record<string, unknown>>, snakeName: string): unknown {
	if (Object.hasOwn(obj, snakeName)) return obj[snakeName];
	const camelName = lowerCamel(snakeName);
	return Object.hasOwn(obj, camelName) ? obj[camelName] : undefined;
}
