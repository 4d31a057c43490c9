import { isAlphanumeric, startsWithIgnoringCase } from "./characters";

/** The only prefixes a URL may start with to be linked. */
const SAFE_PREFIXES = [
	"/",
	"http://",
	"https://",
	"ftp://",
	"mailto:",
] as const;

/**
 * Checks whether the text from `start` begins with an allowed scheme (or a leading "/"), compared case-insensitively, immediately followed by an alphanumeric character.
 *
 * This is what keeps `javascript:`, `data:` and similar schemes from ever becoming links.
 */
export function isSafeLink(text: string, start = 0): boolean {
	for (const prefix of SAFE_PREFIXES) {
		if (text.length - start <= prefix.length) continue;
		if (!startsWithIgnoringCase(text, start, prefix)) continue;
		if (isAlphanumeric(text.charCodeAt(start + prefix.length))) return true;
	}
	return false;
}
