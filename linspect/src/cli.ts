import yargs, { type Argv, type Options } from "yargs";

import { LISTENER_TYPES } from "./classify.ts";
import { ANY_PORT, ListenerFilter } from "./filter.ts";
import { enableVerbose, logger } from "./log.ts";
import { ConfigWriter, type OutputSink } from "./writer.ts";

const log = logger("cli");

/** Reads the dump from `--file`; `-` means standard input. */
export const STDIN_PATH = "-";

export const OUTPUT_FORMATS = ["short", "json", "yaml"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface CliIO {
	stdout: OutputSink;
	readFile(path: string): Promise<string>;
}

export type ListenerArgs = {
	file: string;
	address: string;
	port: number;
	type: string;
	output: OutputFormat;
	verbose: boolean;
};

export const listenerOptions: Record<keyof ListenerArgs, Options> = {
	file: {
		alias: "f",
		description: "Envoy config dump (JSON or YAML); - reads standard input",
		type: "string",
		default: STDIN_PATH,
	},
	address: {
		description: "Filter listeners by address field",
		type: "string",
		default: "",
	},
	port: {
		description: "Filter listeners by port field",
		type: "number",
		default: ANY_PORT,
	},
	type: {
		description: `Filter listeners by type field (${LISTENER_TYPES.join(", ")})`,
		type: "string",
		default: "",
	},
	output: {
		alias: "o",
		description: "Output format",
		type: "string",
		choices: OUTPUT_FORMATS,
		default: "short",
	},
	verbose: {
		description: "Log pipeline stages to stderr",
		type: "boolean",
		default: false,
	},
};

/** Run one `listener` invocation against already-resolved arguments. */
export async function runListener(args: ListenerArgs, io: CliIO): Promise<void> {
	if (args.verbose) enableVerbose();
	log("reading config dump from %s", args.file === STDIN_PATH ? "stdin" : args.file);
	const text = await io.readFile(args.file);

	const writer = new ConfigWriter(io.stdout);
	writer.prime(text);
	const filter = new ListenerFilter({ address: args.address, port: args.port, type: args.type });
	if (args.output === "short") {
		writer.printListenerSummary(filter);
	} else {
		writer.printListenerDump(filter, args.output);
	}
}

function isOutputFormat(value: unknown): value is OutputFormat {
	return OUTPUT_FORMATS.some((f) => f === value);
}

/**
 * Build the command line. Parse failures and command errors reject
 * `parseAsync()` instead of exiting the process.
 */
export function getCli(argv: readonly string[], io: CliIO): Argv {
	return yargs(argv)
		.env("LINSPECT")
		.scriptName("linspect")
		.command(
			["listener", "listeners", "l"],
			"Summarize or dump the listeners of an Envoy config dump",
			(cmd) => cmd.options(listenerOptions),
			async (argv) => {
				const output = argv.output;
				if (!isOutputFormat(output)) {
					throw new Error(`unknown output format: ${String(output)}`);
				}
				await runListener(
					{
						file: String(argv.file),
						address: String(argv.address),
						port: Number(argv.port),
						type: String(argv.type),
						output,
						verbose: argv.verbose === true,
					},
					io,
				);
			},
		)
		.demandCommand(1)
		.strict()
		.showHelpOnFail(false)
		.exitProcess(false)
		.fail(false)
		.alias("h", "help");
}
