export type AutolinkErrorCode =
	| "INVALID_MODE"
	| "INVALID_CALLBACK_RESULT"
	| "INVALID_ARGUMENT";

/**
 * Base class of every error raised by linkspan. A detector that finds nothing is not an error; only invalid input, options or callback results are.
 */
export class AutolinkError extends Error {
	readonly code: AutolinkErrorCode;

	constructor(message: string, code: AutolinkErrorCode) {
		super(message);
		this.name = "AutolinkError";
		this.code = code;
	}
}

export class InvalidModeError extends AutolinkError {
	readonly mode: unknown;

	constructor(mode: unknown) {
		super(
			`Invalid linking mode ${JSON.stringify(mode) ?? String(mode)} (possible values are "all", "urls", "email_addresses")`,
			"INVALID_MODE",
		);
		this.name = "InvalidModeError";
		this.mode = mode;
	}
}

export class InvalidCallbackResultError extends AutolinkError {
	/** The runtime type of the value the callback returned. */
	readonly receivedType: string;

	constructor(receivedType: string, expected = "a string") {
		super(
			`Link text callback must return ${expected}, received ${receivedType}`,
			"INVALID_CALLBACK_RESULT",
		);
		this.name = "InvalidCallbackResultError";
		this.receivedType = receivedType;
	}
}

export class InvalidArgumentError extends AutolinkError {
	constructor(message: string) {
		super(message, "INVALID_ARGUMENT");
		this.name = "InvalidArgumentError";
	}
}

/**
 * Names the runtime type of a value for error messages: "null", "array", or the result of `typeof`.
 */
export function describeType(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}
