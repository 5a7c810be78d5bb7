/**
 * CLI for apg-verify
 *
 *   apg-verify [archive] [-a <path>] [-f <version>] [--no-color]
 *
 * Output goes through an injected context so the CLI runs in process.
 */

import cac, { type CAC } from "cac";
import { type CheckOptions, checkArchive } from "../check";
import { errorMessage } from "../errors";
import { FORMAT_VERSIONS, isFormatVersion } from "../validate/schema";
import { createPalette, formatReport } from "./format";
import { mainHelp } from "./help";
import { VERSION } from "./version";

/**
 * CLI context for dependency injection
 */
export interface CLIContext {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	/** Check settings that have no flag, such as `tmpDir`. */
	checkOptions?: Omit<CheckOptions, "formatVersion">;
}

/**
 * Result of one CLI run. `0` valid, `1` check failed, `2` usage error.
 */
export interface CommandResult {
	exitCode: 0 | 1 | 2;
	error?: string;
}

/**
 * Create the CLI instance with its options registered
 */
export function createCLI(): CAC {
	const cli = cac("apg-verify");

	cli.version(VERSION);
	cli.help();

	cli
		.command("[archive]", "validate an APG package archive")
		.option("-a, --apgfile <path>", "Path to the APG archive")
		.option("-f, --format <version>", "Metadata format version (1 or 2)", {
			default: 1,
		})
		.option("--no-color", "Disable colored output")
		.action(() => {});

	return cli;
}

/**
 * Execute the CLI with the given arguments (without the node and script paths)
 */
export async function runCLI(
	args: string[],
	context: CLIContext,
): Promise<CommandResult> {
	const { stdout, stderr } = context;

	// Handle --version and -v
	if (args.includes("--version") || args.includes("-v")) {
		stdout(VERSION);
		return { exitCode: 0 };
	}

	// Handle --help and -h
	if (args.includes("--help") || args.includes("-h")) {
		stdout(mainHelp());
		return { exitCode: 0 };
	}

	const parsed = createCLI().parse(["node", "apg-verify", ...args], {
		run: false,
	});
	const options: Record<string, unknown> = parsed.options;
	const palette = createPalette(options.color !== false);

	// cac turns numeric values into numbers.
	const apgfile = options.apgfile;
	const flagPath =
		typeof apgfile === "string" || typeof apgfile === "number"
			? String(apgfile)
			: "";
	const positional = parsed.args[0];
	const archivePath =
		flagPath || (positional === undefined ? "" : String(positional));
	if (!archivePath) {
		const error =
			"No apg file specified. Pass it as an argument or with --apgfile.";
		stderr(palette.red(error));
		return { exitCode: 2, error };
	}

	const formatVersion = Number(options.format);
	if (!isFormatVersion(formatVersion)) {
		const error = `Unsupported format version "${String(
			options.format,
		)}". Use ${FORMAT_VERSIONS.join(" or ")}.`;
		stderr(palette.red(error));
		return { exitCode: 2, error };
	}

	try {
		const report = await checkArchive(archivePath, {
			...context.checkOptions,
			formatVersion,
		});
		const lines = formatReport(report, palette);

		for (const line of lines.stderr) stderr(line);
		for (const line of lines.stdout) stdout(line);

		if (report.ok) return { exitCode: 0 };

		const failure = report.extraction.ok
			? (report.validation?.structuralError ?? report.validation?.schemaError)
			: report.extraction.error;
		return { exitCode: 1, error: failure?.message };
	} catch (err: unknown) {
		const error = errorMessage(err);
		stderr(palette.red(`Error: ${error}`));
		return { exitCode: 1, error };
	}
}
