import { isAlpha } from "./characters";
import type { Span } from "./types";

/**
 * Decides where a candidate link really ends, so that it does not swallow the prose punctuation around it.
 *
 *   1. The link is cut at the first "<": it never runs into markup.
 *   2. Trailing "?", "!", ".", "," and ":" are stripped, and so is a trailing ";" together with the named entity it closes ("&quot;"), until neither applies.
 *   3. A trailing closing bracket or quote is kept only when it balances an opener inside the link.
 *
 * @returns The resolved span, or null if nothing is left of it.
 *
 * @example
 * ```ts
 * resolveDelimiters("see https://en.example.org/Mercury_(planet)", { start: 4, end: 43 }); // { start: 4, end: 43 }
 * resolveDelimiters("(https://en.example.org/Mercury_(planet))", { start: 1, end: 41 }); // { start: 1, end: 40 }
 * resolveDelimiters("see https://example.com/docs.", { start: 4, end: 29 }); // { start: 4, end: 28 }
 * ```
 */
export function resolveDelimiters(text: string, span: Span): Span | null {
	const start = span.start;
	let end = span.end;

	for (let i = start; i < end; i++) {
		if (text.charCodeAt(i) === 0x3c /* < */) {
			end = i;
			break;
		}
	}

	while (end > start) {
		const code = text.charCodeAt(end - 1);
		if (isTrailingPunctuation(code)) {
			end--;
		} else if (code === 0x3b /* ; */) {
			end = stripEntityReference(text, start, end);
		} else {
			break;
		}
	}

	if (end === start) return null;

	const closer = text.charCodeAt(end - 1);
	const opener = getMatchingOpener(closer);
	if (opener !== null) {
		let numOfOpeners = 0;
		let numOfClosers = 0;
		for (let i = start; i < end; i++) {
			const code = text.charCodeAt(i);
			// For quotes the opener and the closer are the same character, so every occurrence counts as an opener and a trailing quote never balances.
			if (code === opener) numOfOpeners++;
			else if (code === closer) numOfClosers++;
		}

		// If the closer is unbalanced, it closes something opened before the link and is not part of it.
		if (numOfOpeners !== numOfClosers) end--;
	}

	if (end === start) return null;

	return { start, end };
}

function isTrailingPunctuation(code: number): boolean {
	switch (code) {
		case 0x3f: /* ? */
		case 0x21: /* ! */
		case 0x2e: /* . */
		case 0x2c: /* , */
		case 0x3a: /* : */
			return true;
		default:
			return false;
	}
}

/**
 * Given a span ending in ";", returns the new end of the span: before the "&" if the ";" closes a named entity reference such as "&amp;", otherwise just before the ";". Numeric references ("&#123;") are not named entities, so only their ";" is stripped.
 */
function stripEntityReference(
	text: string,
	start: number,
	end: number,
): number {
	let index = end - 2;
	while (index > start && isAlpha(text.charCodeAt(index))) index--;

	if (index < end - 2 && text.charCodeAt(index) === 0x26 /* & */) return index;

	return end - 1;
}

function getMatchingOpener(code: number): number | null {
	switch (code) {
		case 0x22 /* " */:
			return 0x22;
		case 0x27 /* ' */:
			return 0x27;
		case 0x29 /* ) */:
			return 0x28; /* ( */
		case 0x5d /* ] */:
			return 0x5b; /* [ */
		case 0x7d /* } */:
			return 0x7b; /* { */
		default:
			return null;
	}
}
