import { readFile } from "node:fs/promises";
import { text } from "node:stream/consumers";
import { hideBin } from "yargs/helpers";

import { STDIN_PATH, getCli } from "./cli.ts";
import { describeError } from "./errors.ts";

async function readDump(path: string): Promise<string> {
	if (path === STDIN_PATH) return text(process.stdin);
	return readFile(path, "utf-8");
}

try {
	await getCli(hideBin(process.argv), { stdout: process.stdout, readFile: readDump }).parseAsync();
} catch (e) {
	process.stderr.write(`Error: ${describeError(e)}\n`);
	process.exitCode = 1;
}
