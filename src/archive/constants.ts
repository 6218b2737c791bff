/**
 * Entry types an archive can hold.
 *
 * `"file"` is a regular file. `"symlink"` is a placeholder tag: it carries no
 * link target and is never resolved.
 */
export const FILE_TYPES = ["file", "directory", "symlink"] as const;

/** Size of every entry that has no content body. */
export const EMPTY_SIZE = 0;
