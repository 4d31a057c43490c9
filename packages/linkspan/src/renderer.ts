import { describeType, InvalidCallbackResultError } from "./errors";
import type { LinkKind, LinkTextCallback, Span } from "./types";

/** Written before the matched text in the href, so that bare domains and addresses become absolute links. */
const HREF_PREFIXES: Record<LinkKind, string> = {
	url: "",
	www: "http://",
	email: "mailto:",
};

/**
 * Renders the span as an anchor tag. The matched text goes into the href as-is: it is neither escaped nor percent-encoded.
 *
 * @example
 * ```ts
 * renderLink("mail jane@example.com", { start: 5, end: 21 }, "email", {});
 * // '<a href="mailto:jane@example.com">jane@example.com</a>'
 * ```
 */
export function renderLink(
	text: string,
	link: Span,
	kind: LinkKind,
	options: { linkAttribute?: string; onLink?: LinkTextCallback },
): string {
	const href = text.slice(link.start, link.end);

	let html = `<a href="${HREF_PREFIXES[kind]}${href}"`;
	html +=
		options.linkAttribute === undefined ? ">" : ` ${options.linkAttribute}>`;
	html +=
		options.onLink === undefined ? href : getLinkText(options.onLink, href);
	html += "</a>";

	return html;
}

function getLinkText(onLink: LinkTextCallback, href: string): string {
	// The callback may come from untyped code, so its result is checked at runtime.
	const linkText: unknown = onLink(href);
	if (typeof linkText !== "string") {
		throw new InvalidCallbackResultError(describeType(linkText));
	}
	return linkText;
}
