/**
 * Status output for the CLI. Everything goes to stderr so that stdout only ever carries the linked text.
 */

import type { CliIo } from "./io";

export function printError(io: CliIo, message: string): void {
	io.stderr.write(`${io.colors.red("✗")} ${message}\n`);
}

export function printWarning(io: CliIo, message: string): void {
	io.stderr.write(`${io.colors.yellow("!")} ${message}\n`);
}

export function printSuccess(io: CliIo, message: string): void {
	io.stderr.write(`${io.colors.green("✓")} ${message}\n`);
}

export function printInfo(io: CliIo, message: string): void {
	io.stderr.write(`${io.colors.dim(message)}\n`);
}

export function pluralize(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
