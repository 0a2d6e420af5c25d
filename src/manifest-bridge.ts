import { isSupportedAlignment } from './data-block-codec.js';
import type { EntryTable } from './entry-table.js';
import { NonFatalError } from './errors.js';
import { encodeName } from './info-codec.js';

import type { Entry, ManifestEntry, ManifestFile, Payload } from './types/archive.js';

export const MANIFEST_TYPE = 'texture archive manifest';

export interface PayloadSink {
	writePayload(file: string, bytes: Buffer): Promise<void>;
}

export interface ManifestTarget extends PayloadSink {
	writeManifest(document: string): Promise<void>;
}

export interface PayloadSource {
	/** Where `file` would be found, for error messages. */
	locate(file: string): string;
	/** Resolves to `undefined` if `file` does not exist. */
	readPayload(file: string): Promise<Buffer | undefined>;
}

export interface ManifestOptions {
	alignment: number;
	payloadDirectory: string;
	/** Appended to every entry name to form its payload file name. */
	extension: string;
}

export interface SizeMismatch {
	index: number;
	name: string;
	recorded: number;
	actual: number;
}

export function serializeManifest(manifest: ManifestFile) {
	return JSON.stringify(manifest, undefined, '\t') + '\n';
}

// matches how case-insensitive file systems compare names
const fileNameKey = (file: string) => file.normalize('NFC').toLowerCase();

/** Checks every entry before anything is written: names, payloads, and distinct payload file names. */
function payloadFiles(table: EntryTable, payloads: ReadonlyMap<string, Buffer>, extension: string) {
	const files: { entry: Entry; file: string; bytes: Buffer }[] = [];
	const claimed = new Map<string, { index: number; name: string }>();

	for (const [index, entry] of table.entries.entries()) {
		encodeName(entry.name, index);

		const bytes = payloads.get(entry.name);
		if (!bytes) throw new NonFatalError('NOT_FOUND', { name: entry.name });

		const file = entry.name + extension;
		const key = fileNameKey(file);
		const other = claimed.get(key);
		if (other) throw new NonFatalError('PAYLOAD_FILE_COLLISION', { index, name: entry.name, otherIndex: other.index, otherName: other.name, file });
		claimed.set(key, { index, name: entry.name });

		files.push({ entry, file, bytes });
	}

	return files;
}

/**
 * Builds the manifest for `table`, then writes each payload and finally the manifest document to
 * `target`. Entries keep table order.
 */
export async function toManifest(
	table: EntryTable,
	payloads: ReadonlyMap<string, Buffer>,
	target: ManifestTarget,
	options: ManifestOptions,
): Promise<ManifestFile> {
	const manifest: ManifestFile = {
		type: MANIFEST_TYPE,
		alignment: options.alignment,
		payloadDirectory: options.payloadDirectory,
		entries: [],
	};

	for (const { entry, file, bytes } of payloadFiles(table, payloads, options.extension)) {
		await target.writePayload(file, bytes);
		manifest.entries.push({
			name: entry.name,
			size: entry.size,
			flags: entry.flags,
			file,
		});
	}

	await target.writeManifest(serializeManifest(manifest));

	return manifest;
}

/**
 * Reads every payload the manifest references, in manifest order. A payload's actual length wins
 * over the recorded `size`; differences are reported in `sizeMismatches`.
 */
export async function fromManifest(manifest: ManifestFile, source: PayloadSource) {
	const payloads: Payload[] = [];
	const sizeMismatches: SizeMismatch[] = [];

	for (const [index, entry] of manifest.entries.entries()) {
		const bytes = await source.readPayload(entry.file);
		if (!bytes) throw new NonFatalError('MISSING_PAYLOAD_FILE', { index, name: entry.name, path: source.locate(entry.file) });

		if (bytes.length !== entry.size) sizeMismatches.push({ index, name: entry.name, recorded: entry.size, actual: bytes.length });
		payloads.push({ name: entry.name, flags: entry.flags, bytes });
	}

	return { payloads, sizeMismatches };
}

//////////////
// VALIDATION

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const isUInt32 = (value: unknown): value is number =>
	typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xFFFFFFFF;

/** Checks the shape of a decoded manifest document. Names are checked later, when encoded. */
export function parseManifest(json: unknown, path: string): ManifestFile {
	const invalid = (reason: string) => new NonFatalError('JSON_INVALID', { path, type: 'manifest', reason });

	if (!isRecord(json) || json.type !== MANIFEST_TYPE) throw invalid(`"type" must be "${MANIFEST_TYPE}"`);
	if (typeof json.alignment !== 'number' || !isSupportedAlignment(json.alignment)) throw invalid('"alignment" must be a power of two');
	if (typeof json.payloadDirectory !== 'string') throw invalid('"payloadDirectory" must be a string');
	if (!Array.isArray(json.entries)) throw invalid('"entries" must be an array');

	const rawEntries: unknown[] = json.entries;
	const entries: ManifestEntry[] = [];
	for (const [index, entry] of rawEntries.entries()) {
		if (
			!isRecord(entry) ||
			typeof entry.name !== 'string' ||
			typeof entry.file !== 'string' ||
			!isUInt32(entry.size) ||
			!isUInt32(entry.flags)
		) throw invalid(`entry ${index} needs a string "name" and "file" and 32-bit unsigned integers "size" and "flags"`);

		entries.push({
			name: entry.name,
			size: entry.size,
			flags: entry.flags,
			file: entry.file,
		});
	}

	return {
		type: MANIFEST_TYPE,
		alignment: json.alignment,
		payloadDirectory: json.payloadDirectory,
		entries,
	};
}
