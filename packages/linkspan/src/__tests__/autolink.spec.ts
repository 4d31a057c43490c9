import { describe, expect, it, vi } from "vitest";
import { autolink } from "../autolink";
import {
	InvalidArgumentError,
	InvalidCallbackResultError,
	InvalidModeError,
} from "../errors";
import {
	AutolinkFlags,
	type AutolinkMode,
	type LinkTextCallback,
} from "../types";

describe("autolink", () => {
	describe("text without links", () => {
		it("returns the input untouched", () => {
			const text = "Ratio 3:2, ask foo@bar, nothing to see here.";
			const result = autolink(text);
			expect(result).toEqual({ output: text, linkCount: 0 });
			expect(result.output).toBe(text);
		});

		it("handles empty input", () => {
			expect(autolink("")).toEqual({ output: "", linkCount: 0 });
		});

		it("does not link a www. prefix in the middle of a word", () => {
			expect(autolink("awww.example.com").linkCount).toBe(0);
		});
	});

	describe("URLs", () => {
		it("links a URL inside a sentence", () => {
			expect(autolink("Visit http://example.com today")).toEqual({
				output:
					'Visit <a href="http://example.com">http://example.com</a> today',
				linkCount: 1,
			});
		});

		it("strips trailing sentence punctuation", () => {
			expect(autolink("Visit http://example.com.").output).toBe(
				'Visit <a href="http://example.com">http://example.com</a>.',
			);
		});

		it("keeps a closing parenthesis that balances one inside the link", () => {
			expect(autolink("http://example.com/Mercury_(planet)").output).toBe(
				'<a href="http://example.com/Mercury_(planet)">http://example.com/Mercury_(planet)</a>',
			);
		});

		it("drops a closing parenthesis that closes one opened before the link", () => {
			expect(autolink("(http://example.com/Mercury_(planet))").output).toBe(
				'(<a href="http://example.com/Mercury_(planet)">http://example.com/Mercury_(planet)</a>)',
			);
		});

		it("matches the scheme case-insensitively", () => {
			expect(autolink("HTTP://EXAMPLE.COM").output).toBe(
				'<a href="HTTP://EXAMPLE.COM">HTTP://EXAMPLE.COM</a>',
			);
		});

		it("links ftp URLs", () => {
			expect(autolink("get ftp://files.example.org/pub").output).toBe(
				'get <a href="ftp://files.example.org/pub">ftp://files.example.org/pub</a>',
			);
		});

		it("does not link unsafe schemes", () => {
			const text =
				"click javascript:alert(1) or javascript://example.com/%0Aalert(1)";
			expect(autolink(text)).toEqual({ output: text, linkCount: 0 });
		});

		it("strips a trailing named entity but keeps one inside the link", () => {
			expect(autolink("Read http://example.com/?a=1&amp;b=2&quot;").output).toBe(
				'Read <a href="http://example.com/?a=1&amp;b=2">http://example.com/?a=1&amp;b=2</a>&quot;',
			);
		});

		it("passes non-ASCII characters through", () => {
			expect(autolink("Café → http://example.com/ünïcode ok").output).toBe(
				'Café → <a href="http://example.com/ünïcode">http://example.com/ünïcode</a> ok',
			);
		});
	});

	describe("short domains", () => {
		it("links a host without a dot when the flag is set", () => {
			expect(
				autolink("http://localhost", { flags: AutolinkFlags.ShortDomains }),
			).toEqual({
				output: '<a href="http://localhost">http://localhost</a>',
				linkCount: 1,
			});
		});

		it("does not link a host without a dot by default", () => {
			expect(autolink("http://localhost")).toEqual({
				output: "http://localhost",
				linkCount: 0,
			});
		});

		it("keeps the port and path after a short host", () => {
			expect(
				autolink("http://localhost:3000/api", {
					flags: AutolinkFlags.ShortDomains,
				}).output,
			).toBe('<a href="http://localhost:3000/api">http://localhost:3000/api</a>');
		});

		it("exposes a stable flag value", () => {
			expect(AutolinkFlags.ShortDomains).toBe(1);
		});
	});

	describe("www. domains and emails", () => {
		it("links a bare www. domain with an http:// href", () => {
			expect(autolink("Go to www.example.com now").output).toBe(
				'Go to <a href="http://www.example.com">www.example.com</a> now',
			);
		});

		it("links an email address with a mailto: href", () => {
			expect(autolink("Write to jane.doe+news@example.co.uk.").output).toBe(
				'Write to <a href="mailto:jane.doe+news@example.co.uk">jane.doe+news@example.co.uk</a>.',
			);
		});

		it("links every kind of link in one pass", () => {
			expect(
				autolink("http://a.example.com, www.b.example.com and c@example.com"),
			).toEqual({
				output:
					'<a href="http://a.example.com">http://a.example.com</a>, <a href="http://www.b.example.com">www.b.example.com</a> and <a href="mailto:c@example.com">c@example.com</a>',
				linkCount: 3,
			});
		});

		it("links a long document of many short links in one pass", () => {
			const link = '<a href="mailto:a@b.co">a@b.co</a> ';
			const result = autolink("a@b.co ".repeat(400_000));
			expect(result.linkCount).toBe(400_000);
			expect(result.output).toBe(link.repeat(400_000));
		});

		it("never reaches back into a link that was already written", () => {
			expect(autolink("foo@example.x-http://bar.example.org")).toEqual({
				output:
					'<a href="mailto:foo@example.x-http">foo@example.x-http</a>://bar.example.org',
				linkCount: 1,
			});
		});
	});

	describe("modes", () => {
		const text = "mail me at a@b.com or visit http://x.com";

		it("links only email addresses", () => {
			expect(autolink(text, { mode: "email_addresses" })).toEqual({
				output:
					'mail me at <a href="mailto:a@b.com">a@b.com</a> or visit http://x.com',
				linkCount: 1,
			});
		});

		it("links only URLs", () => {
			expect(autolink(text, { mode: "urls" })).toEqual({
				output:
					'mail me at a@b.com or visit <a href="http://x.com">http://x.com</a>',
				linkCount: 1,
			});
		});

		it("links both by default", () => {
			expect(autolink(text).linkCount).toBe(2);
		});

		it("rejects an unknown mode before scanning", () => {
			expect(() =>
				autolink(text, { mode: "links" as unknown as AutolinkMode }),
			).toThrow(InvalidModeError);
		});
	});

	describe("link attributes", () => {
		it("writes the attribute into the opening tag without leading whitespace", () => {
			expect(
				autolink("http://example.com", { linkAttribute: '  target="_blank"' })
					.output,
			).toBe('<a href="http://example.com" target="_blank">http://example.com</a>');
		});

		it("ignores an attribute made of whitespace only", () => {
			expect(
				autolink("http://example.com", { linkAttribute: "   " }).output,
			).toBe('<a href="http://example.com">http://example.com</a>');
		});
	});

	describe("skip tags", () => {
		it("does not link inside the default skip tags", () => {
			const text = "<pre>http://example.com</pre>";
			expect(autolink(text)).toEqual({ output: text, linkCount: 0 });
		});

		it("links inside a tag removed from the skip list", () => {
			const expected = {
				output: '<pre><a href="http://example.com">http://example.com</a></pre>',
				linkCount: 1,
			};
			expect(autolink("<pre>http://example.com</pre>", { skipTags: [] })).toEqual(
				expected,
			);
			expect(
				autolink("<pre>http://example.com</pre>", { skipTags: ["code"] }),
			).toEqual(expected);
		});

		it("does not double-link existing anchors", () => {
			expect(
				autolink(
					'<a href="http://example.com">http://example.com</a> and http://example.org',
				).output,
			).toBe(
				'<a href="http://example.com">http://example.com</a> and <a href="http://example.org">http://example.org</a>',
			);
		});
	});

	describe("link text callback", () => {
		it("replaces the visible text and keeps the href", () => {
			const onLink = vi.fn(() => "LINK");
			expect(autolink("see http://x.com", { onLink }).output).toBe(
				'see <a href="http://x.com">LINK</a>',
			);
			expect(onLink).toHaveBeenCalledWith("http://x.com");
		});

		it("is called once per link, left to right", () => {
			const onLink = vi.fn((link: string) => link.toUpperCase());
			const result = autolink("http://a.example.com and jane@example.com", {
				onLink,
			});
			expect(onLink.mock.calls).toEqual([
				["http://a.example.com"],
				["jane@example.com"],
			]);
			expect(result.output).toBe(
				'<a href="http://a.example.com">HTTP://A.EXAMPLE.COM</a> and <a href="mailto:jane@example.com">JANE@EXAMPLE.COM</a>',
			);
		});

		it("fails when the callback does not return a string", () => {
			const onLink = (() => 42) as unknown as LinkTextCallback;
			expect(() => autolink("see http://x.com", { onLink })).toThrow(
				InvalidCallbackResultError,
			);
			expect(() => autolink("see http://x.com", { onLink })).toThrow(
				"Link text callback must return a string, received number",
			);
		});

		it("propagates an error thrown by the callback", () => {
			expect(() =>
				autolink("see http://x.com", {
					onLink: () => {
						throw new Error("callback failed");
					},
				}),
			).toThrow("callback failed");
		});

		it("is not called when there is no link", () => {
			const onLink = vi.fn(() => "LINK");
			autolink("nothing here", { onLink });
			expect(onLink).not.toHaveBeenCalled();
		});
	});

	describe("argument validation", () => {
		it("rejects text that is not a string", () => {
			expect(() => autolink(42 as unknown as string)).toThrow(
				InvalidArgumentError,
			);
		});

		it("rejects skip tags that are not strings", () => {
			expect(() =>
				autolink("x", { skipTags: [1] as unknown as string[] }),
			).toThrow("Skip tags must be strings, received number");
		});

		it("rejects flags that are not integers", () => {
			expect(() => autolink("x", { flags: 0.5 })).toThrow(InvalidArgumentError);
		});
	});
});
