import { Command, CommanderError, Option } from "commander";
import {
	type AutolinkBytesOptions,
	AutolinkError,
	AutolinkFlags,
	autolinkBytes,
	autolinkPlainText,
	parseMode,
	VERSION,
} from "linkspan";
import {
	pluralize,
	printError,
	printInfo,
	printSuccess,
	printWarning,
} from "./format";
import type { CliIo } from "./io";

export interface LinkCommandOptions {
	mode: string;
	linkAttr?: string;
	skipTags?: string;
	shortDomains?: boolean;
	plain?: boolean;
	output?: string;
	count?: boolean;
	quiet?: boolean;
}

/** Raised for option combinations that commander cannot reject on its own. */
export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

export function createProgram(io: CliIo): Command {
	return new Command()
		.name("linkspan")
		.description(
			"Wrap the URLs, www. domains and email addresses of plain text or HTML in <a> tags",
		)
		.version(VERSION)
		.argument("[files...]", "files to link (standard input when omitted)")
		.addOption(
			new Option("-m, --mode <mode>", "all | urls | email_addresses")
				.default("all")
				.env("LINKSPAN_MODE"),
		)
		.addOption(
			new Option(
				"-a, --link-attr <attributes>",
				'attributes written into every link, e.g. \'target="_blank"\'',
			).env("LINKSPAN_LINK_ATTR"),
		)
		.addOption(
			new Option(
				"-s, --skip-tags <tags>",
				'comma-separated tags whose content is never linked ("" to link everywhere)',
			).env("LINKSPAN_SKIP_TAGS"),
		)
		.option(
			"--short-domains",
			"accept hosts without a dot, e.g. http://localhost",
		)
		.option("--plain", "escape the input as plain text before linking")
		.option("-o, --output <file>", "write to a file instead of stdout")
		.option("--count", "print the number of links instead of the text")
		.option("-q, --quiet", "do not print status messages")
		.exitOverride()
		.configureOutput({
			writeOut: (text) => io.stdout.write(text),
			writeErr: (text) => io.stderr.write(text),
		})
		.action(async (files: string[], options: LinkCommandOptions) => {
			await linkCommand(files, options, io);
		});
}

/**
 * Runs the CLI with the given arguments (without the node and script paths) and resolves to the exit code.
 */
export async function runCli(
	argv: readonly string[],
	io: CliIo,
): Promise<number> {
	try {
		await createProgram(io).parseAsync([...argv], { from: "user" });
		return 0;
	} catch (error) {
		// commander has already written its own message (or the help and version output).
		if (error instanceof CommanderError) return error.exitCode;

		printError(io, formatError(error));
		return 1;
	}
}

export async function linkCommand(
	files: string[],
	options: LinkCommandOptions,
	io: CliIo,
): Promise<void> {
	if (options.output !== undefined && files.length > 1) {
		throw new UsageError("--output takes a single input file");
	}
	if (options.output !== undefined && options.count) {
		throw new UsageError("--count cannot be combined with --output");
	}

	const linkOptions: AutolinkBytesOptions = {
		mode: parseMode(options.mode),
		linkAttribute: options.linkAttr,
		skipTags:
			options.skipTags === undefined
				? undefined
				: parseTagList(options.skipTags),
		flags: options.shortDomains ? AutolinkFlags.ShortDomains : 0,
	};

	const sources =
		files.length === 0
			? [{ name: "<stdin>", read: () => io.readStdin() }]
			: files.map((file) => ({ name: file, read: () => io.readFile(file) }));

	const outputs: Uint8Array[] = [];
	let totalCount = 0;

	for (const source of sources) {
		const input = await source.read();
		const { output, linkCount } = options.plain
			? linkPlainText(input, linkOptions)
			: autolinkBytes(input, linkOptions);

		outputs.push(output);
		totalCount += linkCount;

		if (options.quiet) continue;
		if (linkCount === 0) {
			printWarning(io, `${source.name}: no links found`);
		} else if (sources.length > 1) {
			printInfo(io, `${source.name}: ${pluralize(linkCount, "link")}`);
		}
	}

	if (options.count) {
		io.stdout.write(`${totalCount}\n`);
	} else if (options.output !== undefined) {
		await io.writeFile(options.output, Buffer.concat(outputs));
	} else {
		for (const output of outputs) io.stdout.write(output);
	}

	if (!options.quiet) {
		printSuccess(
			io,
			`Created ${pluralize(totalCount, "link")} in ${pluralize(sources.length, "input")}`,
		);
	}
}

/**
 * "a, pre,code" -> ["a", "pre", "code"]; an empty string gives an empty list.
 */
export function parseTagList(value: string): string[] {
	return value
		.split(",")
		.map((tag) => tag.trim())
		.filter((tag) => tag.length > 0);
}

function linkPlainText(
	input: Uint8Array,
	options: AutolinkBytesOptions,
): { output: Uint8Array; linkCount: number } {
	const { output, linkCount } = autolinkPlainText(
		new TextDecoder().decode(input),
		{ ...options, onLink: undefined },
	);
	return { output: Buffer.from(output, "utf8"), linkCount };
}

function formatError(error: unknown): string {
	if (error instanceof AutolinkError || error instanceof UsageError) {
		return error.message;
	}
	if (error instanceof Error) return `${error.name}: ${error.message}`;
	return String(error);
}
