/**
 * Argument handling for the report-export CLI, returning an exit code.
 */
import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { applyTaskOverrides } from "./config.js";
import { ReportExport } from "./index.js";

export const USAGE = `
report-export — export a reporting API report as newline-delimited JSON

Usage:
  report-export --config <file.json> [--since <date>] [--until <date>] [--key <key>]

Options:
  --config <file>    JSON file with "analytics", "storage" and "task" sections
  --since <date>     Override task.since (YYYY-MM-DD or YYYY-MM-DD HH:MM:SS)
  --until <date>     Override task.until
  --key <key>        Override task.key (destination object key)
  --help             Show this help
`.trim();

export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

export async function runCli(args: string[], out: CliOutput = console): Promise<number> {
  try {
    const { values } = parseArgs({
      args,
      options: {
        config: { type: "string" },
        since: { type: "string" },
        until: { type: "string" },
        key: { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
    });

    if (values.help) {
      out.log(USAGE);
      return 0;
    }

    if (!values.config) {
      out.error(USAGE);
      return 1;
    }

    const raw: unknown = JSON.parse(await readFile(values.config, "utf8"));
    const overrides = {
      ...(values.since ? { since: values.since } : {}),
      ...(values.until ? { until: values.until } : {}),
      ...(values.key ? { key: values.key } : {}),
    };
    const result = await ReportExport.fromConfig(applyTaskOverrides(raw, overrides)).run();
    out.log(
      `Exported ${result.recordCount} records for view ${result.viewId} to ${result.bucket}/${result.key}`,
    );
    return 0;
  } catch (err) {
    out.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
