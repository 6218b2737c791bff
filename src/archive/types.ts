import type { FILE_TYPES } from "./constants";

/** Type tag of an archive entry. */
export type FileType = (typeof FILE_TYPES)[number];

/**
 * Metadata describing an archive entry.
 */
export interface EntryHeader {
	/** Entry name. Stored as given: no path normalization, may be empty. */
	readonly name: string;
	/** UTF-8 byte length of the entry data. Always 0 for directories and symlinks. */
	readonly size: number;
	/** Entry type. */
	readonly type: FileType;
}

/**
 * A single entry held by an archive.
 */
export interface Entry {
	readonly header: EntryHeader;
	/** Raw content. Always empty for directories and symlinks. */
	readonly data: string;
}

/**
 * Summary of an archive's contents, recomputed on every request.
 */
export interface ArchiveStats {
	/** Number of entries of any type. */
	totalEntries: number;
	/** Number of regular file entries. */
	fileCount: number;
	/** Number of directory entries. */
	directoryCount: number;
	/** Sum of the sizes of regular file entries. */
	totalSize: number;
}

/**
 * A name and content pair, the unit of {@link createSimpleArchive} and
 * {@link extractSimpleArchive}.
 */
export interface SimpleEntry {
	name: string;
	content: string;
}

/**
 * Options for {@link extractSimpleArchive}.
 */
export interface ExtractOptions {
	/** Number of leading path components to strip from entry names (e.g., strip: 1 removes first directory) */
	strip?: number;
	/** Filter function to include/exclude entries (return false to skip) */
	filter?: (header: EntryHeader) => boolean;
}
