import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ExtractError, isErrnoException, toIoError } from "../errors";

const securityError = (message: string, entryName: string) =>
	new ExtractError("PATH_SECURITY", message, { entryName });

/**
 * Cleans an entry name lexically: POSIX normalisation, trailing slashes
 * removed, an empty name becomes `"."`.
 */
export function cleanEntryName(name: string): string {
	let cleaned = path.posix.normalize(name);
	while (cleaned.length > 1 && cleaned.endsWith("/")) {
		cleaned = cleaned.slice(0, -1);
	}
	return cleaned;
}

/**
 * Applies the lexical guards to a raw entry name and returns its cleaned form.
 *
 * Rejects any `..` segment (before or after cleaning), absolute names in POSIX
 * or Windows form, names longer than `maxNameLength` and names holding a NUL.
 */
export function sanitizeEntryName(name: string, maxNameLength: number): string {
	const cleaned = cleanEntryName(name);

	if (name.split(/[\\/]/).includes("..")) {
		throw securityError(
			`Archive contains path traversal attempt: "${name}".`,
			name,
		);
	}

	if (path.posix.isAbsolute(cleaned) || path.win32.isAbsolute(cleaned)) {
		throw securityError(`Archive contains absolute path: "${name}".`, name);
	}

	if (cleaned === ".." || cleaned.startsWith("../")) {
		throw securityError(
			`Archive contains path traversal attempt: "${name}".`,
			name,
		);
	}

	if (cleaned.length > maxNameLength) {
		throw securityError(
			`Path too long: "${name}" (${cleaned.length} characters, limit ${maxNameLength}).`,
			name,
		);
	}

	if (cleaned.includes("\0")) {
		throw securityError(
			`Path contains a NUL byte: ${JSON.stringify(name)}.`,
			name,
		);
	}

	return cleaned;
}

/**
 * Joins a cleaned entry name onto the canonical root and proves the result
 * stays inside it, on disk as well as lexically.
 */
export async function resolveTarget(
	root: string,
	cleanedName: string,
	cache: Set<string>,
	entryName: string,
): Promise<string> {
	const target = path.join(root, cleanedName);

	validateBounds(
		target,
		root,
		`Path traversal detected, target path outside destination: "${entryName}".`,
		entryName,
	);

	if (target === root) return target;

	await validatePath(path.dirname(target), root, cache, entryName);

	// An existing symlink at the target would redirect the write.
	const stat = await lstatIfExists(target, entryName);
	if (stat?.isSymbolicLink()) {
		await validateSymlink(target, root, entryName);
	}

	return target;
}

/**
 * Recursively validates that each item of the given path exists and is a directory or
 * a safe symlink.
 *
 * We need to call this for each path component to ensure that no symlinks escape the
 * target directory. Missing components are fine: they will be created as directories.
 */
export async function validatePath(
	currentPath: string,
	root: string,
	cache: Set<string>,
	entryName: string,
): Promise<void> {
	// If the path is the root or is already in our cache, we're done.
	if (currentPath === root || cache.has(currentPath)) {
		return;
	}

	validateBounds(
		currentPath,
		root,
		`Path traversal detected, target path outside destination: "${entryName}".`,
		entryName,
	);

	// Parents first, so a file in the middle of the path is reported as such.
	await validatePath(path.dirname(currentPath), root, cache, entryName);

	const stat = await lstatIfExists(currentPath, entryName);

	if (stat && !stat.isDirectory()) {
		if (!stat.isSymbolicLink()) {
			// Any other file type is an invalid component for a directory path.
			throw securityError(
				`Path traversal attempt detected: "${currentPath}" is not a valid directory component for "${entryName}".`,
				entryName,
			);
		}

		await validateSymlink(currentPath, root, entryName);
	}

	cache.add(currentPath);
}

// Validates that the given target path is within the destination directory and does not escape.
export function validateBounds(
	targetPath: string,
	destDir: string,
	errorMessage: string,
	entryName: string,
): void {
	if (!(targetPath === destDir || targetPath.startsWith(destDir + path.sep))) {
		throw securityError(errorMessage, entryName);
	}
}

// A symlink is acceptable only when its fully resolved target is inside the root.
async function validateSymlink(
	linkPath: string,
	root: string,
	entryName: string,
): Promise<void> {
	let realPath: string;
	try {
		realPath = await fs.realpath(linkPath);
	} catch (err) {
		throw new ExtractError(
			"PATH_SECURITY",
			`Path traversal attempt detected: symlink "${linkPath}" cannot be resolved.`,
			{ entryName, cause: err },
		);
	}

	validateBounds(
		realPath,
		root,
		`Path traversal attempt detected: symlink "${linkPath}" points outside the extraction directory.`,
		entryName,
	);
}

async function lstatIfExists(
	target: string,
	entryName: string,
): Promise<Stats | null> {
	try {
		return await fs.lstat(target);
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") return null;

		throw toIoError(`Cannot inspect "${target}"`, err, entryName);
	}
}
