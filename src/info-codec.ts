import { EntryTable } from './entry-table.js';
import { NonFatalError } from './errors.js';

import { ReadBuffer, WriteBuffer } from './util/byte-cursor.js';

import type { Entry } from './types/archive.js';

export const INFO_HEADER_SIZE = 0x4;
export const DESCRIPTOR_SIZE = 0x10;
// entry names double as payload file names
export const MAX_NAME_LENGTH = 0xFF;

const MAX_UINT32 = 0xFFFFFFFF;
const RESERVED_NAMES = new Set(['.', '..']);

const nameDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

const isUInt32 = (value: number) => Number.isInteger(value) && value >= 0 && value <= MAX_UINT32;

/**
 * Throws `ENCODING_ERROR` or `NAME_TOO_LONG` if `name` cannot be stored in the string table or
 * used as a file name. Returns the UTF-8 bytes otherwise.
 */
export function encodeName(name: string, index: number) {
	const reject = (reason: string) => new NonFatalError('ENCODING_ERROR', { index, name, reason });

	if (name.length === 0) throw reject('name is empty');
	if (name.includes('\0')) throw reject('name contains a NUL character');
	if (/[\\/]/.test(name)) throw reject('name contains a path separator');
	if (RESERVED_NAMES.has(name)) throw reject('name is reserved');
	if (/\p{Surrogate}/u.test(name)) throw reject('name contains an unpaired surrogate');

	const bytes = Buffer.from(name, 'utf8');
	if (bytes.length > MAX_NAME_LENGTH) throw new NonFatalError('NAME_TOO_LONG', { index, name, length: bytes.length, max: MAX_NAME_LENGTH });

	return bytes;
}

function readName(reader: ReadBuffer, position: number, index: number) {
	const bytes = reader.peekTerminated(position);
	if (!bytes) {
		throw new NonFatalError('TRUNCATED_INFO', {
			what: `the name of entry ${index} (at offset ${position})`,
			needed: position + 1,
			available: reader.totalSize,
		});
	}

	try {
		return nameDecoder.decode(bytes);
	} catch {
		throw new NonFatalError('ENCODING_ERROR', { index, name: bytes.toString('hex'), reason: 'name is not valid UTF-8' });
	}
}

export function parseInfo(bytes: Buffer) {
	const reader = new ReadBuffer(bytes);

	if (!reader.canRead(INFO_HEADER_SIZE)) {
		throw new NonFatalError('TRUNCATED_INFO', { what: 'the header', needed: INFO_HEADER_SIZE, available: bytes.length });
	}

	const numEntries = reader.readUInt32();
	const stringTableOffset = INFO_HEADER_SIZE + numEntries * DESCRIPTOR_SIZE;
	if (stringTableOffset > bytes.length) {
		throw new NonFatalError('TRUNCATED_INFO', { what: `a table of ${numEntries} entries`, needed: stringTableOffset, available: bytes.length });
	}

	const entries: Entry[] = [];
	for (let index = 0; index < numEntries; index++) {
		const namePointer = reader.readUInt32();
		const offset = reader.readUInt32();
		const flags = reader.readUInt32();
		const size = reader.readUInt32();

		entries.push({
			name: readName(reader, stringTableOffset + namePointer, index),
			offset,
			size,
			flags,
		});
	}

	return new EntryTable(entries).validate();
}

export function infoLength(table: EntryTable) {
	let length = INFO_HEADER_SIZE + table.length * DESCRIPTOR_SIZE;
	for (const entry of table) length += Buffer.byteLength(entry.name, 'utf8') + 1;
	return length;
}

/**
 * Names go into the string table in entry order, one NUL after each, without deduplication, so
 * equal tables always serialize to equal bytes.
 */
export function serializeInfo(table: EntryTable) {
	const descriptors = new WriteBuffer();
	const strings = new WriteBuffer();

	descriptors.writeUInt32(table.length);
	for (const [index, entry] of table.entries.entries()) {
		const name = encodeName(entry.name, index);
		for (const field of ['offset', 'size', 'flags'] as const) {
			if (!isUInt32(entry[field])) {
				throw new NonFatalError('ENCODING_ERROR', { index, name: entry.name, reason: `${field} ${entry[field]} does not fit in 32 bits` });
			}
		}

		descriptors.writeUInt32(strings.bytesWritten); // name pointer
		descriptors.writeUInt32(entry.offset);
		descriptors.writeUInt32(entry.flags);
		descriptors.writeUInt32(entry.size);
		strings.writeChar8Terminated(name);
	}

	return Buffer.concat([descriptors.toBuffer(), strings.toBuffer()]);
}
