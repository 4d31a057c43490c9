import { isSpace, toLowerAscii } from "./characters";
import { type Detector, matchEmail, matchUrl, matchWww } from "./detectors";
import { renderLink } from "./renderer";
import type {
	AutolinkMode,
	AutolinkResult,
	LinkKind,
	LinkTextCallback,
} from "./types";

/**
 * Tags whose content is never linked unless the caller passes its own list: existing anchors, preformatted and code blocks, keyboard input and scripts.
 */
export const DEFAULT_SKIP_TAGS: readonly string[] = Object.freeze([
	"a",
	"pre",
	"code",
	"kbd",
	"script",
]);

export interface ScanOptions {
	mode: AutolinkMode;
	flags: number;
	/** Already trimmed; undefined when no attribute is written. */
	linkAttribute: string | undefined;
	skipTags: readonly string[];
	onLink: LinkTextCallback | undefined;
}

type TriggerTable = Map<number, { kind: LinkKind; detect: Detector }>;

/**
 * Walks the text once, copying it to the output and replacing every detected link with its anchor tag.
 *
 * "<" is always active: the inside of a tag is never linked, and the content of a skip tag is copied verbatim up to its closing tag.
 * The other trigger characters depend on the mode: ":" (URL), "w" and "W" (bare `www.` domain) and "@" (email).
 *
 * When no link is found the input string itself is returned; nothing is copied.
 */
export function scan(text: string, options: ScanOptions): AutolinkResult {
	const triggers = getTriggerTable(options.mode);
	const skipTags = options.skipTags.map((tag) => tag.toLowerCase());

	let output = "";
	let linkCount = 0;

	// `cursor` is the start of the text not yet copied to the output; `position` is the next character to examine.
	let cursor = 0;
	let position = 0;

	while (position < text.length) {
		const code = text.charCodeAt(position);

		if (code === 0x3c /* < */) {
			position = skipTag(text, position, skipTags);
			continue;
		}

		const trigger = triggers.get(code);
		if (trigger === undefined) {
			position++;
			continue;
		}

		const link = trigger.detect(text, position, options.flags);

		// A detector may walk backward from its trigger; it must not reach into text that was already written out.
		if (link === null || link.start < cursor) {
			position++;
			continue;
		}

		output += text.slice(cursor, link.start);
		output += renderLink(text, link, trigger.kind, options);
		linkCount++;

		cursor = link.end;
		position = link.end;
	}

	if (linkCount === 0) return { output: text, linkCount };

	output += text.slice(cursor);

	return { output, linkCount };
}

function getTriggerTable(mode: AutolinkMode): TriggerTable {
	const triggers: TriggerTable = new Map();

	if (mode === "all" || mode === "email_addresses") {
		triggers.set(0x40 /* @ */, { kind: "email", detect: matchEmail });
	}

	if (mode === "all" || mode === "urls") {
		triggers.set(0x77 /* w */, { kind: "www", detect: matchWww });
		// matchWww wants a lowercase "www.": "W" never links.
		triggers.set(0x57 /* W */, { kind: "www", detect: matchWww });
		triggers.set(0x3a /* : */, { kind: "url", detect: matchUrl });
	}

	return triggers;
}

/**
 * Given the offset of a "<", returns the offset of the ">" that ends the tag, or of the ">" that ends the matching closing tag when the tag is one of `skipTags`.
 * An unterminated tag extends to the end of the text.
 */
function skipTag(
	text: string,
	position: number,
	skipTags: readonly string[],
): number {
	let index = skipToCharacter(text, position, 0x3e /* > */);

	const tagName = skipTags.find(
		(tag) => matchTag(text, position, tag) === "open",
	);
	if (tagName === undefined) return index;

	// Look for the closing tag. Nested tags of the same name are not counted: the first closing tag ends the region.
	while (true) {
		index = skipToCharacter(text, index, 0x3c /* < */);
		if (index === text.length) return index;

		if (matchTag(text, index, tagName) === "close") break;

		index++;
	}

	return skipToCharacter(text, index, 0x3e /* > */);
}

/**
 * Checks whether the text at `position` is an opening or closing tag named `tagName` (lowercase), followed by whitespace or ">".
 */
function matchTag(
	text: string,
	position: number,
	tagName: string,
): "open" | "close" | null {
	if (
		text.length - position < 3 ||
		text.charCodeAt(position) !== 0x3c /* < */
	) {
		return null;
	}

	let index = position + 1;

	const isClosing = text.charCodeAt(index) === 0x2f; /* / */
	if (isClosing) index++;

	for (let i = 0; i < tagName.length; i++, index++) {
		if (index >= text.length) return null;
		if (toLowerAscii(text.charCodeAt(index)) !== tagName.charCodeAt(i)) {
			return null;
		}
	}

	if (index >= text.length) return null;

	const code = text.charCodeAt(index);
	if (isSpace(code) || code === 0x3e /* > */) {
		return isClosing ? "close" : "open";
	}

	return null;
}

function skipToCharacter(text: string, index: number, code: number): number {
	const found = text.indexOf(String.fromCharCode(code), index);
	return found === -1 ? text.length : found;
}
