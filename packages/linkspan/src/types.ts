/**
 * A half-open range `[start, end)` of code unit offsets into the scanned text.
 */
export interface Span {
	readonly start: number;
	readonly end: number;
}

/**
 * Which detectors are active during a scan.
 *   - "all"             -> URLs, bare `www.` domains and email addresses
 *   - "urls"            -> URLs and bare `www.` domains only
 *   - "email_addresses" -> email addresses only
 */
export type AutolinkMode = "all" | "urls" | "email_addresses";

/** The detector that produced a link. Decides the prefix written before the href. */
export type LinkKind = "url" | "www" | "email";

/**
 * Bit flags accepted by `AutolinkOptions.flags`. The numeric values are stable.
 */
export const AutolinkFlags = {
	/** Accept hosts without a dot in URLs, e.g. `http://localhost`. Has no effect on `www.` domains or emails. */
	ShortDomains: 1 << 0,
} as const;

/**
 * Receives the matched text of a link and returns the text to display inside the anchor.
 */
export type LinkTextCallback = (link: string) => string;

export interface AutolinkOptions {
	/** Defaults to "all". */
	mode?: AutolinkMode;
	/** Inserted verbatim into every generated `<a>` tag. Not escaped or validated. */
	linkAttribute?: string;
	/** Tags whose content is never linked. Defaults to `DEFAULT_SKIP_TAGS`; an empty list disables skipping. */
	skipTags?: readonly string[];
	/** A bitset of `AutolinkFlags`. */
	flags?: number;
	onLink?: LinkTextCallback;
}

export interface AutolinkResult {
	/** The linked text, or the input itself when `linkCount` is 0. */
	output: string;
	linkCount: number;
}
