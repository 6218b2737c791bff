import type { EntryHeader, ExtractOptions } from "./types";

// Apply strip and filter options to a header.
export function transformHeader(
	header: EntryHeader,
	options: ExtractOptions,
): EntryHeader | null {
	const { strip, filter } = options;
	if (!strip && !filter) {
		return header;
	}

	let h = header;

	// Strip path components.
	if (strip && strip > 0) {
		const components = h.name.split("/").filter(Boolean); // Filter empty strings.
		if (strip >= components.length) {
			return null; // Path is fully stripped
		}
		h = { ...h, name: components.slice(strip).join("/") };
	}

	if (filter?.(h) === false) {
		return null; // Skip filtered entry
	}

	return h;
}
