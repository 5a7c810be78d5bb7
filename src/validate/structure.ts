import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type RequiredPath, StructuralValidationError } from "../errors";

const REQUIRED_LAYOUT: ReadonlyArray<{
	path: RequiredPath;
	kind: "directory" | "file";
}> = [
	{ path: "data", kind: "directory" },
	{ path: "md5sums", kind: "file" },
	{ path: "metadata.json", kind: "file" },
];

/**
 * Checks the mandatory top-level layout, in order, and returns the first
 * violation. Symlinks are not followed.
 */
export async function checkLayout(
	root: string,
): Promise<StructuralValidationError | undefined> {
	for (const required of REQUIRED_LAYOUT) {
		let stat: Stats;
		try {
			stat = await fs.lstat(path.join(root, required.path));
		} catch (err) {
			return new StructuralValidationError(required.path, "missing", {
				cause: err,
			});
		}

		const matches =
			required.kind === "directory" ? stat.isDirectory() : stat.isFile();
		if (!matches) {
			return new StructuralValidationError(required.path, "wrong-type");
		}
	}

	return undefined;
}
