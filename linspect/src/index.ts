// Core types
export type { FieldInput, FieldMatcher, FieldValue } from "./types.ts";

// Type-tagged values
export {
	LEGACY_LISTENER_TYPE_URL,
	LEGACY_LISTENERS_DUMP_TYPE_URL,
	LISTENER_TYPE_URL,
	LISTENERS_DUMP_TYPE_URL,
	TypedValue,
	field,
	toTypedValue,
} from "./any.ts";

// Config dump
export {
	ConfigDump,
	DynamicListener,
	ListenerState,
	ListenersConfigDump,
	StaticListener,
	parseConfigDump,
} from "./dump.ts";

// Listeners
export {
	Filter,
	FilterChain,
	Listener,
	decodeListener,
	listenerAddress,
	listenerPort,
} from "./listener.ts";
export type { SocketAddress } from "./listener.ts";
export { extractListeners } from "./extract.ts";
export {
	BLACK_HOLE_CLUSTER,
	HTTP_CONNECTION_MANAGER,
	LISTENER_TYPES,
	TCP_PROXY,
	classifyListener,
} from "./classify.ts";
export type { ListenerType } from "./classify.ts";

// Filtering
export { ANY_PORT, AddressInput, ListenerFilter, PortInput, TypeInput } from "./filter.ts";
export type { ListenerFilterOptions } from "./filter.ts";
export { AllOf, FieldPredicate, MatchAll, allOf } from "./predicate.ts";
export type { Predicate } from "./predicate.ts";
export { ContainsMatcher, ExactMatcher, ExactNumberMatcher } from "./matchers.ts";

// Rendering
export { TableWriter } from "./table.ts";
export { ConfigWriter, DUMP_FORMATS } from "./writer.ts";
export type { DumpFormat, OutputSink } from "./writer.ts";

// Errors
export {
	DecodeError,
	EmptyResultError,
	InspectError,
	InvalidFilterError,
	NotPrimedError,
	PrimeError,
	RenderError,
	RetrievalError,
} from "./errors.ts";
