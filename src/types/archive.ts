/*
 * Info file (NAME_info.bin)
 *
 * uint32     | 0x1  | entry count        | [aa]
 * Descriptor | [aa] | entry descriptors  | 0x10 bytes each
 * char8      | ???  | string table       | NUL-terminated UTF-8 names, starts at 0x4 + 0x10 * [aa]
 *
 * Data file (NAME.bin)
 *
 * data       | ???  | payloads           | in table order, each followed by zero padding up to the alignment
 */

/*
 * uint32 | 0x1 | name pointer | relative to start of string table
 * uint32 | 0x1 | offset       | relative to start of data file
 * uint32 | 0x1 | flags        | opaque
 * uint32 | 0x1 | size         |
 */
export interface Entry {
	readonly name: string;
	readonly offset: number;
	readonly size: number;
	readonly flags: EntryFlags;
}

/** uint32 carried through unchanged. Known archives use it to mark raw or compressed containers. */
export type EntryFlags = number;

export interface Payload {
	readonly name: string;
	readonly flags: EntryFlags;
	readonly bytes: Buffer;
}

export interface ManifestFile {
	type: 'texture archive manifest';
	alignment: number;
	/** Relative to the directory holding the manifest. */
	payloadDirectory: string;
	entries: ManifestEntry[];
}

export interface ManifestEntry {
	name: string;
	size: number;
	flags: EntryFlags;
	/** File name inside `payloadDirectory`. */
	file: string;
}
