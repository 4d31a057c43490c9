export { type CliIo, createNodeIo } from "./io";
export {
	createProgram,
	type LinkCommandOptions,
	linkCommand,
	parseTagList,
	runCli,
	UsageError,
} from "./program";
