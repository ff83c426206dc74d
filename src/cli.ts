import { writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { readFile } from "./read.js";
import { createLogger } from "./logger.js";
import { isWorkbookError } from "./errors.js";

export interface CliIo {
	stdout: { write(chunk: string): unknown };
	stderr: { write(chunk: string): unknown };
	env: Record<string, string | undefined>;
}

const USAGE = `Usage: xlsx-lens <input.xlsx> [-o <output.json>]

Print the parsed workbook as JSON.

Options:
  -o, --output <file>  Write the JSON to a file instead of stdout
  -h, --help           Show this help

Environment:
  XLSX_LENS_LOG_LEVEL  Log level for diagnostics on stderr (default: warn)
`;

function describe(error: unknown): string {
	if (isWorkbookError(error)) {
		return `${error.code}: ${error.message}`;
	}
	return error instanceof Error ? error.message : String(error);
}

/**
 * Run the command line with `argv` excluding the node and script paths.
 * @returns the process exit code
 */
export function runCli(argv: string[], io: CliIo): number {
	let values: { output?: string; help?: boolean };
	let positionals: string[];
	try {
		({ values, positionals } = parseArgs({
			args: argv,
			allowPositionals: true,
			options: {
				output: { type: "string", short: "o" },
				help: { type: "boolean", short: "h" },
			},
		}));
	} catch (e) {
		io.stderr.write(`xlsx-lens: ${describe(e)}\n`);
		return 2;
	}

	if (values.help) {
		io.stdout.write(USAGE);
		return 0;
	}
	if (positionals.length !== 1) {
		io.stderr.write(`xlsx-lens: expected one input file\n${USAGE}`);
		return 2;
	}

	try {
		const logger = createLogger({ level: io.env.XLSX_LENS_LOG_LEVEL ?? "warn", destination: io.stderr });
		const workbook = readFile(positionals[0], { logger });
		const json = JSON.stringify(workbook, null, 2) + "\n";
		if (values.output !== undefined) {
			writeFileSync(values.output, json);
			logger.info({ output: values.output, sheets: workbook.sheets.length }, "json_written");
		} else {
			io.stdout.write(json);
		}
		return 0;
	} catch (e) {
		io.stderr.write(`xlsx-lens: ${describe(e)}\n`);
		return 1;
	}
}
