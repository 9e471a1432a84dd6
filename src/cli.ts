#!/usr/bin/env node
/**
 * CLI entrypoint for report-export.
 *
 * Usage:
 *   report-export --config export.json --since "2021-05-01 00:00:00" --until 2021-05-02
 */
import { runCli } from "./run-cli.js";

process.exitCode = await runCli(process.argv.slice(2));
