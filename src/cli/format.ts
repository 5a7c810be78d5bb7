import type { CheckReport } from "../check";

const ANSI = {
	red: "\x1b[31m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	reset: "\x1b[0m",
} as const;

export interface Palette {
	red: (text: string) => string;
	green: (text: string) => string;
	yellow: (text: string) => string;
}

const paint =
	(code: string) =>
	(text: string): string =>
		`${code}${text}${ANSI.reset}`;

const plain = (text: string): string => text;

export function createPalette(color: boolean): Palette {
	if (!color) return { red: plain, green: plain, yellow: plain };

	return {
		red: paint(ANSI.red),
		green: paint(ANSI.green),
		yellow: paint(ANSI.yellow),
	};
}

/** Lines to print for a report, split by destination stream. */
export interface ReportLines {
	stdout: string[];
	stderr: string[];
}

/**
 * Renders a check report. Warnings come first, then the verdict, then any
 * cleanup failure.
 */
export function formatReport(
	report: CheckReport,
	palette: Palette,
): ReportLines {
	const stdout: string[] = [];
	const stderr: string[] = [];
	const { extraction, validation } = report;

	for (const warning of extraction.warnings) {
		stderr.push(palette.yellow(`warning: ${warning.message}`));
	}

	if (!extraction.ok) {
		stderr.push(
			palette.red(
				`Extraction error [${extraction.error.code}]: ${extraction.error.message}`,
			),
		);
	} else if (validation?.structuralError) {
		stderr.push(palette.red(`File error: ${validation.structuralError.message}`));
	} else if (validation?.schemaError) {
		stderr.push(palette.red(`Metadata error: ${validation.schemaError.message}`));
	} else if (report.ok) {
		stdout.push(
			palette.green(
				`${report.archivePath}: valid APG package (format v${report.formatVersion})`,
			),
		);
	}

	if (report.cleanupError) {
		stderr.push(
			palette.yellow(
				`warning: failed to remove scratch directory ${report.scratchDir ?? "(unknown)"}: ${report.cleanupError.message}`,
			),
		);
	}

	return { stdout, stderr };
}
