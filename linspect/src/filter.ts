import { classifyListener } from "./classify.ts";
import { InvalidFilterError } from "./errors.ts";
import { type Listener, listenerAddress, listenerPort } from "./listener.ts";
import { ExactMatcher, ExactNumberMatcher } from "./matchers.ts";
import { FieldPredicate, MatchAll, type Predicate, allOf } from "./predicate.ts";
import type { FieldInput, FieldValue } from "./types.ts";

/** Port value that matches any port. */
export const ANY_PORT = 0;

const MAX_PORT = 0xffff_ffff;

export interface ListenerFilterOptions {
	/** Bound address, compared case-insensitively. Empty means any. */
	address?: string;
	/** Bound port. ANY_PORT means any. */
	port?: number;
	/** Listener type (HTTP, TCP, HTTP+TCP, UNKNOWN), compared case-insensitively. Empty means any. */
	type?: string;
}

// =====================================================================
// Inputs
// =====================================================================

export class AddressInput implements FieldInput<Listener> {
	read(ctx: Listener): FieldValue {
		return listenerAddress(ctx);
	}
}

export class PortInput implements FieldInput<Listener> {
	read(ctx: Listener): FieldValue {
		return listenerPort(ctx);
	}
}

/** Runs the classifier, so only consulted when a type is requested. */
export class TypeInput implements FieldInput<Listener> {
	read(ctx: Listener): FieldValue {
		return classifyListener(ctx);
	}
}

// =====================================================================
// ListenerFilter
// =====================================================================

/**
 * Selects listeners by address, port and type. Every set field must match;
 * a filter with no field set matches every listener.
 */
export class ListenerFilter {
	readonly address: string;
	readonly port: number;
	readonly type: string;
	private readonly predicate: Predicate<Listener>;

	constructor(options: ListenerFilterOptions = {}) {
		this.address = options.address ?? "";
		this.port = options.port ?? ANY_PORT;
		this.type = options.type ?? "";
		if (!Number.isInteger(this.port) || this.port < 0 || this.port > MAX_PORT) {
			throw new InvalidFilterError(
				"port",
				`port must be an integer between 0 and ${MAX_PORT}, got ${this.port}`,
			);
		}

		const predicates: Predicate<Listener>[] = [];
		if (this.address !== "") {
			predicates.push(new FieldPredicate(new AddressInput(), new ExactMatcher(this.address, true)));
		}
		if (this.port !== ANY_PORT) {
			predicates.push(new FieldPredicate(new PortInput(), new ExactNumberMatcher(this.port)));
		}
		if (this.type !== "") {
			predicates.push(new FieldPredicate(new TypeInput(), new ExactMatcher(this.type, true)));
		}
		this.predicate = allOf(predicates, new MatchAll());
	}

	/** True when no field is set. */
	isEmpty(): boolean {
		return this.predicate instanceof MatchAll;
	}

	matches(listener: Listener): boolean {
		return this.predicate.evaluate(listener);
	}

	/** Matching listeners, in input order. */
	apply(listeners: readonly Listener[]): Listener[] {
		if (this.isEmpty()) return [...listeners];
		return listeners.filter((l) => this.matches(l));
	}
}
