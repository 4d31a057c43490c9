import { autolink } from "./autolink";
import {
	describeType,
	InvalidArgumentError,
	InvalidCallbackResultError,
} from "./errors";
import type { AutolinkOptions } from "./types";

export interface AutolinkBytesOptions extends Omit<AutolinkOptions, "onLink"> {
	/** Receives the matched bytes; a string result is encoded as UTF-8. */
	onLink?: (link: Uint8Array) => Uint8Array | string;
}

export interface AutolinkBytesResult {
	/** The linked bytes, or the input itself when `linkCount` is 0. */
	output: Uint8Array;
	linkCount: number;
}

/**
 * Same as `autolink`, over raw bytes in any ASCII-compatible encoding.
 *
 * Every byte is mapped to exactly one code unit (latin1) before scanning and back afterwards, so all offsets are byte offsets and bytes that are not valid UTF-8 pass through untouched.
 * Strings passed in the options (`linkAttribute`, and the callback's string results) are encoded as UTF-8.
 */
export function autolinkBytes(
	input: Uint8Array,
	options: AutolinkBytesOptions = {},
): AutolinkBytesResult {
	if (!(input instanceof Uint8Array)) {
		throw new InvalidArgumentError(
			`Input must be a Uint8Array, received ${describeType(input)}`,
		);
	}

	const { onLink, linkAttribute } = options;

	const result = autolink(toByteString(input), {
		...options,
		linkAttribute:
			typeof linkAttribute === "string"
				? encodeByteString(linkAttribute)
				: linkAttribute,
		onLink:
			onLink === undefined
				? undefined
				: (link) => {
						const linkText: unknown = onLink(Buffer.from(link, "latin1"));
						if (typeof linkText === "string") return encodeByteString(linkText);
						if (linkText instanceof Uint8Array) return toByteString(linkText);
						throw new InvalidCallbackResultError(
							describeType(linkText),
							"a string or a Uint8Array",
						);
					},
	});

	if (result.linkCount === 0) return { output: input, linkCount: 0 };

	return {
		output: Buffer.from(result.output, "latin1"),
		linkCount: result.linkCount,
	};
}

function toByteString(bytes: Uint8Array): string {
	return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
		"latin1",
	);
}

function encodeByteString(text: string): string {
	return Buffer.from(text, "utf8").toString("latin1");
}
