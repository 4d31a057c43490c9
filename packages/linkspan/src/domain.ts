import { isAlphanumeric } from "./characters";
import type { Span } from "./types";

/**
 * Consumes the hostname that starts at `start`: alphanumerics, "-" and ".".
 *
 * A dotted domain is required unless `options.allowShort` is set, in which case any non-empty run of domain characters is accepted (`localhost`).
 *
 * @returns The consumed range, or null if `start` does not begin a valid domain.
 *
 * @example
 * ```ts
 * checkDomain("http://example.com/a", 7, { allowShort: false }); // { start: 7, end: 18 }
 * checkDomain("http://localhost", 7, { allowShort: false }); // null
 * ```
 */
export function checkDomain(
	text: string,
	start: number,
	options: { allowShort: boolean },
): Span | null {
	if (!isAlphanumeric(text.charCodeAt(start))) return null;

	let numOfDots = 0;
	let index = start + 1;

	// The last code unit of the input is never consumed here; the detectors extend the link over it afterwards. A dot in that position is thus never counted, so "http://foo." is not a dotted domain.
	for (; index < text.length - 1; index++) {
		const code = text.charCodeAt(index);
		if (code === 0x2e /* . */) {
			numOfDots++;
		} else if (!isAlphanumeric(code) && code !== 0x2d /* - */) {
			break;
		}
	}

	if (!options.allowShort && numOfDots === 0) return null;

	return { start, end: index };
}
