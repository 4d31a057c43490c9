import {
	isAlpha,
	isAlphanumeric,
	isPunctuation,
	isSpace,
} from "./characters";
import { resolveDelimiters } from "./delimiter";
import { checkDomain } from "./domain";
import { isSafeLink } from "./safety";
import { AutolinkFlags, type Span } from "./types";

/**
 * A detector is handed the offset of the character that triggered it and either materializes a link around it or declines with null.
 * Detectors are pure: they keep no state between calls and can be invoked at any offset, in any order.
 */
export type Detector = (
	text: string,
	position: number,
	flags: number,
) => Span | null;

/**
 * Detects a URL around the ":" at `position`, e.g. "https://example.com/path".
 *
 * The scheme is whatever run of ASCII letters precedes the ":", and the link is only accepted when the Safety Classifier accepts it.
 */
export function matchUrl(
	text: string,
	position: number,
	flags: number,
): Span | null {
	if (
		text.length - position < 4 ||
		text.charCodeAt(position + 1) !== 0x2f /* / */ ||
		text.charCodeAt(position + 2) !== 0x2f /* / */
	) {
		return null;
	}

	const domain = checkDomain(text, position + 3, {
		allowShort: (flags & AutolinkFlags.ShortDomains) !== 0,
	});
	if (domain === null) return null;

	const end = skipToWhitespace(text, domain.end);

	// Walk backward from the ":" over the scheme.
	let start = position;
	while (start > 0 && isAlpha(text.charCodeAt(start - 1))) start--;

	if (!isSafeLink(text, start)) return null;

	return resolveDelimiters(text, { start, end });
}

/**
 * Detects a bare domain starting with the literal, case-sensitive "www." at `position`, e.g. "www.example.com".
 * Short domains are never accepted here, whatever the flags.
 */
export function matchWww(text: string, position: number): Span | null {
	// The previous character must not be part of a word: "awww.example.com" is not a link.
	if (position > 0) {
		const previous = text.charCodeAt(position - 1);
		if (!isPunctuation(previous) && !isSpace(previous)) return null;
	}

	if (!text.startsWith("www.", position)) return null;

	const domain = checkDomain(text, position, { allowShort: false });
	if (domain === null) return null;

	return resolveDelimiters(text, {
		start: position,
		end: skipToWhitespace(text, domain.end),
	});
}

/**
 * Detects an email address around the "@" at `position`, e.g. "jane.doe+news@example.com".
 */
export function matchEmail(text: string, position: number): Span | null {
	// Walk backward over the local part.
	let start = position;
	while (start > 0 && isLocalPartCharacter(text.charCodeAt(start - 1))) start--;

	if (start === position) return null;

	let numOfAts = 0;
	let numOfDots = 0;
	let end = position;
	for (; end < text.length; end++) {
		const code = text.charCodeAt(end);
		if (isAlphanumeric(code)) continue;

		if (code === 0x40 /* @ */) {
			numOfAts++;
		} else if (code === 0x2e /* . */ && end < text.length - 1) {
			numOfDots++;
		} else if (code !== 0x2d /* - */ && code !== 0x5f /* _ */) {
			// Any other character, including a "." that ends the input, ends the address.
			break;
		}
	}

	if (end - position < 2 || numOfAts !== 1 || numOfDots === 0) return null;

	return resolveDelimiters(text, { start, end });
}

function isLocalPartCharacter(code: number): boolean {
	if (isAlphanumeric(code)) return true;
	switch (code) {
		case 0x2e: /* . */
		case 0x2b: /* + */
		case 0x2d: /* - */
		case 0x5f: /* _ */
			return true;
		default:
			return false;
	}
}

function skipToWhitespace(text: string, index: number): number {
	while (index < text.length && !isSpace(text.charCodeAt(index))) index++;
	return index;
}
