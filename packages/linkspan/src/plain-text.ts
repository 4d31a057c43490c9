import { escapeUTF8 } from "entities";
import { autolink } from "./autolink";
import type { AutolinkOptions, AutolinkResult } from "./types";

/**
 * Escapes plain text for HTML (`&`, `<`, `>`, `"` and `'`) and then autolinks it.
 *
 * Escaped ampersands in query strings stay inside the link, while an escaped quote or angle bracket right after a link ("&quot;", "&gt;") is trimmed off like any other trailing entity.
 * Unlike `autolink`, the output is the escaped text even when no link is found.
 *
 * @example
 * ```ts
 * autolinkPlainText("Tom & Jerry: <https://example.com/?a=1&b=2>");
 * // {
 * //   output: 'Tom &amp; Jerry: &lt;<a href="https://example.com/?a=1&amp;b=2">https://example.com/?a=1&amp;b=2</a>&gt;',
 * //   linkCount: 1,
 * // }
 * ```
 */
export function autolinkPlainText(
	text: string,
	options: AutolinkOptions = {},
): AutolinkResult {
	return autolink(escapeUTF8(text), options);
}
