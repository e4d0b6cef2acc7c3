import debug from "debug";

export const NAMESPACE = "linspect";

/** Namespaced debug logger, e.g. `logger("extract")` logs under `linspect:extract`. */
export function logger(component: string): debug.Debugger {
	return debug(`${NAMESPACE}:${component}`);
}

/** Turn on every linspect namespace, keeping whatever DEBUG already enabled. */
export function enableVerbose(): void {
	const current = debug.disable();
	debug.enable(current === "" ? `${NAMESPACE}:*` : `${current},${NAMESPACE}:*`);
}
