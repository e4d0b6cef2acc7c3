/** A listener field as read for filtering: an address, a port, a type or a filter name. */
export type FieldValue = string | number;

/** Reads one field of a context, typically a decoded listener. Every listener has every field. */
export interface FieldInput<Ctx> {
	read(ctx: Ctx): FieldValue;
}

/** Decides whether a field value is selected. String and numeric matchers reject the other kind. */
export interface FieldMatcher {
	matches(value: FieldValue): boolean;
}
