import { EMPTY_SIZE } from "./constants";
import type { Entry, FileType } from "./types";

export const encoder = new TextEncoder();

// UTF-8 byte length of a string.
export function byteLength(content: string): number {
	return encoder.encode(content).length;
}

// Builds a frozen entry. The size is always derived from the data; bodyless
// types drop whatever data they are given.
export function createEntry(name: string, type: FileType, data = ""): Entry {
	const body = isBodyless(type) ? "" : data;
	const size = body ? byteLength(body) : EMPTY_SIZE;

	return Object.freeze({
		header: Object.freeze({ name, size, type }),
		data: body,
	});
}

export function isBodyless(type: FileType): boolean {
	switch (type) {
		case "file":
			return false;
		case "directory":
		case "symlink":
			return true;
		default:
			return assertNever(type);
	}
}

export function assertNever(value: never): never {
	throw new Error(`Unexpected entry type: ${String(value)}`);
}
