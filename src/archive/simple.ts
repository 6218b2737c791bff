import { type Archive, createArchive } from "./archive";
import { transformHeader } from "./options";
import type { ExtractOptions, SimpleEntry } from "./types";
import { assertNever } from "./utils";

/**
 * Builds a new archive holding one file entry per pair, in the given order.
 *
 * @example
 * ```typescript
 * import { createSimpleArchive } from 'memtar';
 *
 * const archive = createSimpleArchive([
 *   { name: "hello.txt", content: "hello" },
 *   { name: "notes/todo.md", content: "- ship it" },
 * ]);
 *
 * archive.count(); // 2
 * ```
 */
export function createSimpleArchive(pairs: Iterable<SimpleEntry>): Archive {
	const archive = createArchive();
	for (const { name, content } of pairs) {
		archive.addFile(name, content);
	}

	return archive;
}

/**
 * Extracts the name and content of every regular file in an archive, in
 * archive order. Directories and symlinks are skipped.
 *
 * Without options this is the inverse of {@link createSimpleArchive}.
 *
 * @param archive - Archive to read
 * @param options - Optional name stripping and filtering
 * @example
 * ```typescript
 * import { createArchive, extractSimpleArchive } from 'memtar';
 *
 * const archive = createArchive();
 * archive.addDirectory("site");
 * archive.addFile("site/index.html", "<h1>hi</h1>");
 *
 * extractSimpleArchive(archive, { strip: 1 });
 * // [{ name: "index.html", content: "<h1>hi</h1>" }]
 * ```
 */
export function extractSimpleArchive(
	archive: Archive,
	options: ExtractOptions = {},
): SimpleEntry[] {
	const result: SimpleEntry[] = [];

	for (const entry of archive) {
		switch (entry.header.type) {
			case "file": {
				const header = transformHeader(entry.header, options);
				if (header) {
					result.push({ name: header.name, content: entry.data });
				}
				break;
			}
			case "directory":
			case "symlink":
				break;
			default:
				assertNever(entry.header.type);
		}
	}

	return result;
}
