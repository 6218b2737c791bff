import type { ArchiveStats, Entry } from "./types";
import { assertNever } from "./utils";

// Single pass over the entries. Symlinks only count toward totalEntries.
export function computeStats(entries: Iterable<Entry>): ArchiveStats {
	const stats: ArchiveStats = {
		totalEntries: 0,
		fileCount: 0,
		directoryCount: 0,
		totalSize: 0,
	};

	for (const { header } of entries) {
		stats.totalEntries++;

		switch (header.type) {
			case "file":
				stats.fileCount++;
				stats.totalSize += header.size;
				break;
			case "directory":
				stats.directoryCount++;
				break;
			case "symlink":
				break;
			default:
				assertNever(header.type);
		}
	}

	return stats;
}
