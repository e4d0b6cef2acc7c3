import type { FieldMatcher, FieldValue } from "./types.ts";

/**
 * Whole-string equality. Filter names are compared as written; addresses and
 * listener types given on the command line compare with `ignoreCase`.
 */
export class ExactMatcher implements FieldMatcher {
	private readonly expected: string;

	constructor(
		readonly value: string,
		readonly ignoreCase: boolean = false,
	) {
		this.expected = this.fold(value);
	}

	matches(value: FieldValue): boolean {
		return typeof value === "string" && this.fold(value) === this.expected;
	}

	private fold(s: string): string {
		return this.ignoreCase ? s.toLowerCase() : s;
	}
}

/** Case-sensitive search for a marker, such as a cluster name, inside opaque config text. */
export class ContainsMatcher implements FieldMatcher {
	constructor(readonly marker: string) {}

	matches(value: FieldValue): boolean {
		return typeof value === "string" && value.includes(this.marker);
	}
}

/** Port equality. A port is never compared to its decimal string. */
export class ExactNumberMatcher implements FieldMatcher {
	constructor(readonly value: number) {}

	matches(value: FieldValue): boolean {
		return value === this.value;
	}
}
