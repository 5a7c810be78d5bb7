import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { checkArchive } from "../src/check";
import {
	largePackageEntries,
	packageEntries,
	VALID_METADATA_V1,
	VALID_METADATA_V2,
	writeArchive,
} from "./helpers/archive";

describe("checkArchive", () => {
	let tmpDir: string;
	let scratchParent: string;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "apg-verify-check-test-"));
		scratchParent = path.join(tmpDir, "scratch");
		await fs.mkdir(scratchParent);
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("accepts a valid package and removes the scratch directory", async () => {
		const archive = await writeArchive(tmpDir, "hello.apg", packageEntries(VALID_METADATA_V1));

		const report = await checkArchive(archive, { tmpDir: scratchParent });

		expect(report.ok).toBe(true);
		expect(report.archivePath).toBe(archive);
		expect(report.formatVersion).toBe(1);
		expect(report.extraction).toEqual({ ok: true, entries: 6, warnings: [] });
		expect(report.validation).toEqual({ status: "good" });
		expect(report.cleanupError).toBeUndefined();
		expect(Object.isFrozen(report)).toBe(true);
		expect(path.dirname(report.scratchDir ?? "")).toBe(scratchParent);
		expect(path.basename(report.scratchDir ?? "")).toMatch(/^apg-verify-/);
		expect(await fs.readdir(scratchParent)).toEqual([]);
	});

	it("accepts a package with a large payload and removes the scratch directory", async () => {
		const archive = await writeArchive(
			tmpDir,
			"large.apg",
			largePackageEntries(VALID_METADATA_V1),
		);

		const report = await checkArchive(archive, { tmpDir: scratchParent });

		expect(report.ok).toBe(true);
		expect(report.extraction).toEqual({ ok: true, entries: 7, warnings: [] });
		expect(report.validation).toEqual({ status: "good" });
		expect(report.cleanupError).toBeUndefined();
		expect(await fs.readdir(scratchParent)).toEqual([]);
	});

	it("skips validation when extraction fails", async () => {
		const archive = await writeArchive(tmpDir, "evil.apg", [
			...packageEntries(VALID_METADATA_V1),
			{ name: "../evil", content: "x" },
		]);

		const report = await checkArchive(archive, { tmpDir: scratchParent });

		expect(report.ok).toBe(false);
		expect(report.extraction.ok).toBe(false);
		expect(report.validation).toBeUndefined();
		expect(await fs.readdir(scratchParent)).toEqual([]);
	});

	it("reports a validation failure", async () => {
		const archive = await writeArchive(
			tmpDir,
			"bad.apg",
			packageEntries({ ...VALID_METADATA_V1, homepage: "" }),
		);

		const report = await checkArchive(archive, { tmpDir: scratchParent });

		expect(report.ok).toBe(false);
		expect(report.extraction.ok).toBe(true);
		expect(report.validation?.schemaError?.fields).toEqual(["homepage"]);
		expect(await fs.readdir(scratchParent)).toEqual([]);
	});

	it("validates against the selected format version", async () => {
		const v1 = await writeArchive(tmpDir, "v1.apg", packageEntries(VALID_METADATA_V1));
		const v2 = await writeArchive(tmpDir, "v2.apg", packageEntries(VALID_METADATA_V2));

		const v1Report = await checkArchive(v1, { tmpDir: scratchParent, formatVersion: 2 });
		const v2Report = await checkArchive(v2, { tmpDir: scratchParent, formatVersion: 2 });

		expect(v1Report.ok).toBe(false);
		expect(v1Report.validation?.schemaError?.fields).toEqual(["type", "tags", "conf"]);
		expect(v2Report.ok).toBe(true);
		expect(v2Report.formatVersion).toBe(2);
	});

	it("removes directories the archive marked read-only", async () => {
		const archive = await writeArchive(tmpDir, "locked.apg", [
			...packageEntries(VALID_METADATA_V1),
			{ name: "data/locked/", mode: 0o555 },
			{ name: "data/locked/file.txt", content: "x" },
		]);

		const report = await checkArchive(archive, { tmpDir: scratchParent });

		expect(report.ok).toBe(true);
		expect(report.cleanupError).toBeUndefined();
		expect(await fs.readdir(scratchParent)).toEqual([]);
	});

	it("reports a scratch directory that cannot be created", async () => {
		const archive = await writeArchive(tmpDir, "hello.apg", packageEntries(VALID_METADATA_V1));
		const missingParent = path.join(tmpDir, "does-not-exist");

		const report = await checkArchive(archive, { tmpDir: missingParent });

		expect(report.ok).toBe(false);
		expect(report.scratchDir).toBeUndefined();
		expect(report.extraction.ok).toBe(false);
		if (report.extraction.ok) return;
		expect(report.extraction.error.code).toBe("IO_ERROR");
		expect(
			report.extraction.error.message.startsWith(
				`Cannot create scratch directory in "${missingParent}": ENOENT`,
			),
		).toBe(true);
	});
});
