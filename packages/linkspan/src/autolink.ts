import { isSpace } from "./characters";
import {
	describeType,
	InvalidArgumentError,
	InvalidModeError,
} from "./errors";
import { DEFAULT_SKIP_TAGS, scan } from "./scanner";
import type { AutolinkMode, AutolinkOptions, AutolinkResult } from "./types";

const AUTOLINK_MODES: readonly AutolinkMode[] = [
	"all",
	"urls",
	"email_addresses",
];

/**
 * Finds the URLs, bare `www.` domains and email addresses in a block of plain text or HTML and wraps each of them in an `<a>` tag.
 *
 * The text is expected to be escaped already if it is HTML: nothing is escaped here. Links are not created inside the tags named by `options.skipTags` (`a`, `pre`, `code`, `kbd` and `script` by default), nor inside the attributes of any tag.
 *
 * Only `http://`, `https://`, `ftp://` and `mailto:` links are created; bare domains get an `http://` href and emails a `mailto:` href.
 *
 * @returns The linked text and the number of links created. When no link is created, `output` is the input string itself.
 *
 * @example
 * ```ts
 * autolink("Check it out at http://www.example.com", { linkAttribute: 'target="_blank"' });
 * // {
 * //   output: 'Check it out at <a href="http://www.example.com" target="_blank">http://www.example.com</a>',
 * //   linkCount: 1,
 * // }
 *
 * autolink("Check it out at http://www.example.com", { onLink: () => "the example site" });
 * // { output: 'Check it out at <a href="http://www.example.com">the example site</a>', linkCount: 1 }
 * ```
 */
export function autolink(
	text: string,
	options: AutolinkOptions = {},
): AutolinkResult {
	if (typeof text !== "string") {
		throw new InvalidArgumentError(
			`Text must be a string, received ${describeType(text)}`,
		);
	}

	const { onLink } = options;
	if (onLink !== undefined && typeof onLink !== "function") {
		throw new InvalidArgumentError(
			`onLink must be a function, received ${describeType(onLink)}`,
		);
	}

	return scan(text, {
		mode: parseMode(options.mode ?? "all"),
		flags: parseFlags(options.flags ?? 0),
		linkAttribute: normalizeLinkAttribute(options.linkAttribute),
		skipTags: parseSkipTags(options.skipTags ?? DEFAULT_SKIP_TAGS),
		onLink,
	});
}

/**
 * Validates a mode coming from untyped input, such as a command-line argument.
 * @throws {InvalidModeError} If the value is not one of "all", "urls" or "email_addresses".
 */
export function parseMode(mode: unknown): AutolinkMode {
	const match = AUTOLINK_MODES.find((candidate) => candidate === mode);
	if (match === undefined) throw new InvalidModeError(mode);
	return match;
}

function parseFlags(flags: unknown): number {
	if (typeof flags !== "number" || !Number.isInteger(flags)) {
		throw new InvalidArgumentError(
			`Flags must be an integer, received ${describeType(flags)}`,
		);
	}
	return flags;
}

function parseSkipTags(skipTags: unknown): readonly string[] {
	if (!Array.isArray(skipTags)) {
		throw new InvalidArgumentError(
			`Skip tags must be an array of strings, received ${describeType(skipTags)}`,
		);
	}

	const tags: string[] = [];
	for (const tag of skipTags) {
		if (typeof tag !== "string") {
			throw new InvalidArgumentError(
				`Skip tags must be strings, received ${describeType(tag)}`,
			);
		}
		tags.push(tag);
	}
	return tags;
}

/**
 * Removes the leading whitespace of the link attribute. An attribute that is empty afterwards is not written at all.
 */
function normalizeLinkAttribute(linkAttribute: unknown): string | undefined {
	if (linkAttribute === undefined) return undefined;
	if (typeof linkAttribute !== "string") {
		throw new InvalidArgumentError(
			`Link attribute must be a string, received ${describeType(linkAttribute)}`,
		);
	}

	let index = 0;
	while (
		index < linkAttribute.length &&
		isSpace(linkAttribute.charCodeAt(index))
	) {
		index++;
	}

	return index === linkAttribute.length
		? undefined
		: linkAttribute.slice(index);
}
