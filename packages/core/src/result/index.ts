export {
	AccessError,
	ConfigurationError,
	NotFoundError,
	SerializationError,
	SheetMergeError,
	type SourceError,
	toError,
	TransientNetworkError,
} from "./errors";
export {
	Err,
	flatMapResult,
	fromPromise,
	mapErr,
	mapResult,
	Ok,
	type Result,
	unwrapOrThrow,
} from "./result";
