/**
 * Renders the listeners of a primed config dump.
 *
 * Output is assembled in full before a single write to the sink, so a
 * failure at any stage leaves the sink untouched.
 */

import { dump as dumpYaml, load as loadYaml } from "js-yaml";

import { classifyListener } from "./classify.ts";
import { type ConfigDump, parseConfigDump } from "./dump.ts";
import { PrimeError, RenderError, describeError } from "./errors.ts";
import { extractListeners } from "./extract.ts";
import type { ListenerFilter } from "./filter.ts";
import { type Listener, listenerAddress, listenerPort } from "./listener.ts";
import { logger } from "./log.ts";
import { TableWriter } from "./table.ts";

const log = logger("writer");

const SUMMARY_HEADER = "ADDRESS\tPORT\tTYPE";
const JSON_INDENT = 4;

export const DUMP_FORMATS = ["json", "yaml"] as const;

export type DumpFormat = (typeof DUMP_FORMATS)[number];

/** Where rendered output goes. `process.stdout` satisfies it. */
export interface OutputSink {
	write(chunk: string): unknown;
}

export class ConfigWriter {
	private configDump: ConfigDump | null = null;

	constructor(readonly stdout: OutputSink) {}

	/** Load a dump from JSON or YAML text. Self-referencing YAML documents are rejected. */
	prime(text: string): void {
		let data: unknown;
		try {
			data = parseDumpText(text);
			// YAML aliases can close a cycle; every listener is later rendered as JSON.
			JSON.stringify(data);
		} catch (e) {
			throw new PrimeError(describeError(e), { cause: e });
		}
		this.primeDump(parseConfigDump(data));
	}

	primeDump(dump: ConfigDump): void {
		this.configDump = dump;
	}

	/** Print an ADDRESS/PORT/TYPE table of the matching listeners. */
	printListenerSummary(filter: ListenerFilter): void {
		const listeners = this.matchingListeners(filter);
		const table = new TableWriter().writeLine(SUMMARY_HEADER);
		for (const l of listeners) {
			table.row(listenerAddress(l), listenerPort(l), classifyListener(l));
		}
		this.emit(table.flush());
	}

	/**
	 * Print the matching listeners in full as a JSON (default) or YAML array.
	 * Field names are written as the dump spelled them, snake_case or lowerCamelCase.
	 */
	printListenerDump(filter: ListenerFilter, format: DumpFormat = "json"): void {
		const listeners = this.matchingListeners(filter);
		let out: string;
		try {
			out = format === "yaml" ? renderYaml(listeners) : renderJson(listeners);
		} catch (e) {
			throw new RenderError(`failed to marshal listeners: ${describeError(e)}`, { cause: e });
		}
		this.emit(out);
	}

	private matchingListeners(filter: ListenerFilter): Listener[] {
		const listeners = extractListeners(this.configDump);
		const matching = filter.apply(listeners);
		log("rendering %d of %d listeners", matching.length, listeners.length);
		return matching;
	}

	private emit(out: string): void {
		try {
			this.stdout.write(out);
		} catch (e) {
			throw new RenderError(`failed to write output: ${describeError(e)}`, { cause: e });
		}
	}
}

/** JSON first, so duplicate keys resolve to the last value; YAML otherwise. */
function parseDumpText(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return loadYaml(text);
	}
}

function renderJson(listeners: readonly Listener[]): string {
	return `${JSON.stringify(listeners, null, JSON_INDENT)}\n`;
}

function renderYaml(listeners: readonly Listener[]): string {
	return dumpYaml(
		listeners.map((l) => l.toJSON()),
		{ noRefs: true },
	);
}
