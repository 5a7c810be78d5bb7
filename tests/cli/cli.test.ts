import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type CLIContext, runCLI } from "../../src/cli/index";
import { mainHelp } from "../../src/cli/help";
import { VERSION } from "../../src/cli/version";
import {
	largePackageEntries,
	packageEntries,
	VALID_METADATA_V1,
	VALID_METADATA_V2,
	writeArchive,
} from "../helpers/archive";

describe("cli", () => {
	let tmpDir: string;
	let stdout: string[];
	let stderr: string[];
	let context: CLIContext;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "apg-verify-cli-test-"));
		stdout = [];
		stderr = [];
		context = {
			stdout: (text) => stdout.push(text),
			stderr: (text) => stderr.push(text),
			checkOptions: { tmpDir },
		};
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("prints the version", async () => {
		expect(await runCLI(["--version"], context)).toEqual({ exitCode: 0 });
		expect(stdout).toEqual([VERSION]);
	});

	it("prints help", async () => {
		expect(await runCLI(["-h"], context)).toEqual({ exitCode: 0 });
		expect(stdout).toEqual([mainHelp()]);
	});

	it("exits with 2 when no archive is given", async () => {
		const result = await runCLI(["--no-color"], context);

		expect(result.exitCode).toBe(2);
		expect(stderr).toEqual([
			"No apg file specified. Pass it as an argument or with --apgfile.",
		]);
	});

	it("colors usage errors by default", async () => {
		await runCLI([], context);

		expect(stderr).toEqual([
			"\x1b[31mNo apg file specified. Pass it as an argument or with --apgfile.\x1b[0m",
		]);
	});

	it("exits with 2 for an unknown format version", async () => {
		const result = await runCLI(["pkg.apg", "--format", "3", "--no-color"], context);

		expect(result.exitCode).toBe(2);
		expect(stderr).toEqual(['Unsupported format version "3". Use 1 or 2.']);
	});

	it("confirms a valid package", async () => {
		const archive = await writeArchive(tmpDir, "hello.apg", packageEntries(VALID_METADATA_V1));

		const result = await runCLI([archive, "--no-color"], context);

		expect(result).toEqual({ exitCode: 0 });
		expect(stdout).toEqual([`${archive}: valid APG package (format v1)`]);
		expect(stderr).toEqual([]);
	});

	it("confirms a package with a large payload and leaves no scratch directory", async () => {
		const archive = await writeArchive(
			tmpDir,
			"large.apg",
			largePackageEntries(VALID_METADATA_V1),
		);

		const result = await runCLI([archive, "--no-color"], context);

		expect(result).toEqual({ exitCode: 0 });
		expect(stdout).toEqual([`${archive}: valid APG package (format v1)`]);
		expect(await fs.readdir(tmpDir)).toEqual(["large.apg"]);
	});

	it("reads a numeric --apgfile value as a path", async () => {
		const result = await runCLI(["-a", "123", "--no-color"], context);

		expect(result.exitCode).toBe(1);
		expect(result.error?.startsWith("Cannot open archive: ENOENT")).toBe(true);
		expect(await fs.readdir(tmpDir)).toEqual([]);
	});

	it("names the supported format versions in the help text", () => {
		expect(mainHelp()).toContain(
			"-f, --format <version>  Metadata format version, 1 or 2 (default: 1)",
		);
	});

	it("colors the confirmation green", async () => {
		const archive = await writeArchive(tmpDir, "hello.apg", packageEntries(VALID_METADATA_V1));

		await runCLI([archive], context);

		expect(stdout).toEqual([
			`\x1b[32m${archive}: valid APG package (format v1)\x1b[0m`,
		]);
	});

	it("prefers --apgfile over the positional argument", async () => {
		const archive = await writeArchive(tmpDir, "hello.apg", packageEntries(VALID_METADATA_V1));

		const result = await runCLI(
			[path.join(tmpDir, "missing.apg"), "-a", archive, "--no-color"],
			context,
		);

		expect(result.exitCode).toBe(0);
		expect(stdout).toEqual([`${archive}: valid APG package (format v1)`]);
	});

	it("checks format version 2 when asked", async () => {
		const archive = await writeArchive(tmpDir, "hello.apg", packageEntries(VALID_METADATA_V2));

		const result = await runCLI(["-a", archive, "-f", "2", "--no-color"], context);

		expect(result.exitCode).toBe(0);
		expect(stdout).toEqual([`${archive}: valid APG package (format v2)`]);
	});

	it("reports extraction errors with their code", async () => {
		const archive = await writeArchive(tmpDir, "evil.apg", [
			{ name: "../evil", content: "x" },
		]);

		const result = await runCLI([archive, "--no-color"], context);

		expect(result).toEqual({
			exitCode: 1,
			error: 'Archive contains path traversal attempt: "../evil".',
		});
		expect(stderr).toEqual([
			'Extraction error [PATH_SECURITY]: Archive contains path traversal attempt: "../evil".',
		]);
		expect(stdout).toEqual([]);
	});

	it("reports layout errors", async () => {
		const entries = packageEntries(VALID_METADATA_V1).filter((e) => e.name !== "md5sums");
		const archive = await writeArchive(tmpDir, "no-sums.apg", entries);

		const result = await runCLI([archive, "--no-color"], context);

		expect(result.exitCode).toBe(1);
		expect(stderr).toEqual(["File error: a required file or folder is missing: md5sums"]);
	});

	it("reports metadata errors", async () => {
		const { dependencies: _dependencies, ...metadata } = VALID_METADATA_V1;
		const archive = await writeArchive(tmpDir, "no-deps.apg", packageEntries(metadata));

		const result = await runCLI([archive, "--no-color"], context);

		expect(result.exitCode).toBe(1);
		expect(stderr).toEqual(["Metadata error: Missing or empty fields in metadata: dependencies"]);
	});

	it("prints skipped entries as warnings", async () => {
		const archive = await writeArchive(tmpDir, "fifo.apg", [
			...packageEntries(VALID_METADATA_V1),
			{ name: "data/pipe", typeflag: "6" },
		]);

		const result = await runCLI([archive, "--no-color"], context);

		expect(result.exitCode).toBe(0);
		expect(stderr).toEqual(['warning: skipped fifo entry "data/pipe"']);
		expect(stdout).toEqual([`${archive}: valid APG package (format v1)`]);
	});
});
