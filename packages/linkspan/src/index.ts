export { autolink, parseMode } from "./autolink";
export {
	type AutolinkBytesOptions,
	type AutolinkBytesResult,
	autolinkBytes,
} from "./bytes";
export { resolveDelimiters } from "./delimiter";
export { type Detector, matchEmail, matchUrl, matchWww } from "./detectors";
export { checkDomain } from "./domain";
export {
	AutolinkError,
	type AutolinkErrorCode,
	InvalidArgumentError,
	InvalidCallbackResultError,
	InvalidModeError,
} from "./errors";
export { autolinkPlainText } from "./plain-text";
export { isSafeLink } from "./safety";
export { DEFAULT_SKIP_TAGS } from "./scanner";
export {
	AutolinkFlags,
	type AutolinkMode,
	type AutolinkOptions,
	type AutolinkResult,
	type LinkKind,
	type LinkTextCallback,
	type Span,
} from "./types";

export const VERSION = "0.1.0";
