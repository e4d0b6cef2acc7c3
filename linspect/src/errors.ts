/**
 * Error taxonomy for the inspection pipeline: one subclass per stage.
 * Nothing is retried here.
 */

/** Base class for every failure raised while inspecting a config dump. */
export class InspectError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "InspectError";
	}
}

/** No config dump was supplied to the writer. */
export class NotPrimedError extends InspectError {
	constructor() {
		super("config writer has not been primed");
		this.name = "NotPrimedError";
	}
}

/** The dump text could not be parsed into a config dump. */
export class PrimeError extends InspectError {
	readonly source: string;

	constructor(source: string, options?: ErrorOptions) {
		super(`error unmarshalling config dump: ${source}`, options);
		this.name = "PrimeError";
		this.source = source;
	}
}

/** The dump does not expose a listener section of the expected shape. */
export class RetrievalError extends InspectError {
	readonly source: string;

	constructor(source: string) {
		super(`listener dump: ${source}`);
		this.name = "RetrievalError";
		this.source = source;
	}
}

/** A single listener payload could not be decoded. Aborts the extraction. */
export class DecodeError extends InspectError {
	readonly location: string;
	readonly source: string;

	constructor(location: string, source: string) {
		super(`unmarshal listener: ${location}: ${source}`);
		this.name = "DecodeError";
		this.location = location;
		this.source = source;
	}
}

/** The listener section decoded cleanly but held no listeners. */
export class EmptyResultError extends InspectError {
	constructor() {
		super("no listeners found");
		this.name = "EmptyResultError";
	}
}

/** Serializing or writing the rendered output failed. */
export class RenderError extends InspectError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "RenderError";
	}
}

/** A filter field is outside the range it can ever match. */
export class InvalidFilterError extends InspectError {
	readonly field: string;

	constructor(field: string, message: string) {
		super(`invalid listener filter: ${message}`);
		this.name = "InvalidFilterError";
		this.field = field;
	}
}

/** Message of any thrown value, for wrapping. */
export function describeError(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
