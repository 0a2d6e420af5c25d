import { EntryTable } from './entry-table.js';
import { NonFatalError } from './errors.js';

import { WriteBuffer } from './util/byte-cursor.js';

import type { Entry, Payload } from './types/archive.js';

/** Payloads in the known archives are stored back to back, without padding. */
export const DEFAULT_ALIGNMENT = 1;
export const MAX_ALIGNMENT = 0x1000;

export function isSupportedAlignment(alignment: number) {
	return Number.isInteger(alignment) && alignment >= 1 && alignment <= MAX_ALIGNMENT && (alignment & (alignment - 1)) === 0;
}

function assertAlignment(alignment: number) {
	if (!isSupportedAlignment(alignment)) throw new NonFatalError('ALIGNMENT_INVALID', { alignment, max: MAX_ALIGNMENT });
}

export function paddingFor(size: number, alignment: number) {
	return (alignment - (size % alignment)) % alignment;
}

export function readAll(data: Buffer, table: EntryTable) {
	const payloads = new Map<string, Buffer>();

	for (const [index, entry] of table.entries.entries()) {
		const end = entry.offset + entry.size;
		if (end > data.length) {
			throw new NonFatalError('OUT_OF_BOUNDS', { index, name: entry.name, start: entry.offset, end, length: data.length });
		}

		payloads.set(entry.name, data.subarray(entry.offset, end));
	}

	return payloads;
}

/**
 * Lays out `payloads` in order, padding after every payload (the last one included) so each
 * offset is a multiple of `alignment`. The returned table is the only place offsets are authored.
 */
export function writeAll(payloads: Iterable<Payload>, alignment = DEFAULT_ALIGNMENT) {
	assertAlignment(alignment);

	const writer = new WriteBuffer();
	const entries: Entry[] = [];
	for (const payload of payloads) {
		entries.push({
			name: payload.name,
			offset: writer.bytesWritten,
			size: payload.bytes.length,
			flags: payload.flags,
		});

		writer.writeBuffer(payload.bytes);
		writer.writeZeros(paddingFor(payload.bytes.length, alignment));
	}

	return {
		data: writer.toBuffer(),
		table: new EntryTable(entries),
	};
}

/**
 * Smallest alignment under which `writeAll` reproduces both the offsets in `table` and a data file
 * of exactly `dataLength` bytes. `undefined` if no supported alignment does; rebuilding such an
 * archive repacks it and will not match the input.
 */
export function detectAlignment(table: EntryTable, dataLength: number) {
	for (let alignment = 1; alignment <= MAX_ALIGNMENT; alignment *= 2) {
		let offset = 0;
		let matches = true;
		for (const entry of table) {
			if (entry.offset !== offset) {
				matches = false;
				break;
			}

			offset += entry.size + paddingFor(entry.size, alignment);
		}

		if (matches && offset === dataLength) return alignment;
	}

	return undefined;
}
