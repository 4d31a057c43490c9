import { readFile, writeFile } from "node:fs/promises";
import { buffer } from "node:stream/consumers";
import chalk, { type ChalkInstance } from "chalk";

/**
 * Everything the CLI touches outside of its own process. Tests pass an in-memory implementation.
 */
export interface CliIo {
	stdout: { write(chunk: string | Uint8Array): unknown };
	stderr: { write(chunk: string): unknown };
	readFile(path: string): Promise<Uint8Array>;
	writeFile(path: string, data: Uint8Array): Promise<void>;
	readStdin(): Promise<Uint8Array>;
	colors: ChalkInstance;
}

export function createNodeIo(): CliIo {
	return {
		stdout: process.stdout,
		stderr: process.stderr,
		readFile: (path) => readFile(path),
		writeFile: (path, data) => writeFile(path, data),
		readStdin: () => buffer(process.stdin),
		colors: chalk,
	};
}
