import type { FieldInput, FieldMatcher } from "./types.ts";

/** One filter condition: a listener field and the matcher it must satisfy. */
export class FieldPredicate<Ctx> {
	constructor(
		readonly input: FieldInput<Ctx>,
		readonly matcher: FieldMatcher,
	) {}

	evaluate(ctx: Ctx): boolean {
		return this.matcher.matches(this.input.read(ctx));
	}
}

/** Every condition holds. Conditions after the first failing one are not read. */
export class AllOf<Ctx> {
	constructor(readonly predicates: readonly Predicate<Ctx>[]) {}

	evaluate(ctx: Ctx): boolean {
		return this.predicates.every((p) => p.evaluate(ctx));
	}
}

/** The condition of a filter with no field set. Reads nothing. */
export class MatchAll<Ctx> {
	evaluate(_ctx: Ctx): boolean {
		return true;
	}
}

export type Predicate<Ctx> = FieldPredicate<Ctx> | AllOf<Ctx> | MatchAll<Ctx>;

/**
 * Join the conditions of a filter. No conditions gives `matchAll`, so an
 * empty filter can be recognized; a lone condition is returned as is.
 */
export function allOf<Ctx>(
	predicates: readonly Predicate<Ctx>[],
	matchAll: MatchAll<Ctx>,
): Predicate<Ctx> {
	const [only, ...rest] = predicates;
	if (only === undefined) return matchAll;
	return rest.length === 0 ? only : new AllOf(predicates);
}
