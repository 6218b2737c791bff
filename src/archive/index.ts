export { type Archive, createArchive } from "./archive";
export { FILE_TYPES } from "./constants";
export { createSimpleArchive, extractSimpleArchive } from "./simple";
export { computeStats } from "./stats";
export type {
	ArchiveStats,
	Entry,
	EntryHeader,
	ExtractOptions,
	FileType,
	SimpleEntry,
} from "./types";
