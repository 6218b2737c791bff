import { computeStats } from "./stats";
import type { ArchiveStats, Entry } from "./types";
import { createEntry } from "./utils";

/**
 * An ordered, append-only collection of entries.
 *
 * Entries keep their insertion order, which is also the order of
 * {@link Archive.listNames}, the tie-break of {@link Archive.findEntry} and
 * the order of extraction. Names are not unique.
 *
 * An archive is not synchronized. Callers sharing one across concurrent
 * tasks must serialize access themselves.
 */
export interface Archive extends Iterable<Entry> {
	/**
	 * Appends a regular file entry. Its size is the UTF-8 byte length of `content`.
	 * Empty and duplicate names are accepted.
	 */
	addFile(name: string, content: string): void;
	/** Appends a directory entry with empty content. */
	addDirectory(name: string): void;
	/**
	 * Appends a symlink entry. Symlinks are placeholders: they have no target
	 * and no content, and only count toward `totalEntries` in {@link Archive.getStats}.
	 */
	addSymlink(name: string): void;
	/** Number of entries in the archive. */
	count(): number;
	/**
	 * Returns a copy of the entry list. Entries are frozen, and changing the
	 * returned array does not affect the archive.
	 */
	getEntries(): Entry[];
	/** Entry names in insertion order. */
	listNames(): string[];
	/**
	 * Finds the first entry whose name is exactly `name`.
	 *
	 * Matching is case-sensitive and does no path normalization.
	 *
	 * @returns The entry, or `undefined` when no entry has that name
	 */
	findEntry(name: string): Entry | undefined;
	/** Computes entry counts and total file size from the current entries. */
	getStats(): ArchiveStats;
}

/**
 * Creates an empty in-memory archive.
 *
 * @example
 * ```typescript
 * import { createArchive } from 'memtar';
 *
 * const archive = createArchive();
 * archive.addFile("a.txt", "hi");
 * archive.addDirectory("d");
 * archive.addFile("b.txt", "bye");
 *
 * archive.listNames(); // ["a.txt", "d", "b.txt"]
 * archive.getStats(); // { totalEntries: 3, fileCount: 2, directoryCount: 1, totalSize: 5 }
 * ```
 */
export function createArchive(): Archive {
	const entries: Entry[] = [];

	return {
		addFile(name: string, content: string): void {
			entries.push(createEntry(name, "file", content));
		},

		addDirectory(name: string): void {
			entries.push(createEntry(name, "directory"));
		},

		addSymlink(name: string): void {
			entries.push(createEntry(name, "symlink"));
		},

		count(): number {
			return entries.length;
		},

		getEntries(): Entry[] {
			return entries.slice();
		},

		listNames(): string[] {
			return entries.map((entry) => entry.header.name);
		},

		findEntry(name: string): Entry | undefined {
			return entries.find((entry) => entry.header.name === name);
		},

		getStats(): ArchiveStats {
			return computeStats(entries);
		},

		[Symbol.iterator](): Iterator<Entry> {
			// Iterate a copy so appends during iteration are not observed.
			return entries.slice()[Symbol.iterator]();
		},
	};
}
