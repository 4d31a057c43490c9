#!/usr/bin/env tsx
import { createNodeIo } from "./io";
import { runCli } from "./program";

process.exitCode = await runCli(process.argv.slice(2), createNodeIo());
