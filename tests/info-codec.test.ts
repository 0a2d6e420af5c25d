import { describe, expect, it } from 'vitest';

import { EntryTable } from '../src/entry-table.js';
import { infoLength, parseInfo, serializeInfo } from '../src/info-codec.js';

import { buildInfo, caught } from './helpers.js';

const MINIMAL_INFO = Buffer.from(
	'01000000' + // entry count
	'00000000' + // name pointer
	'00000000' + // offset
	'00000000' + // flags
	'04000000' + // size
	'6100', // "a\0"
	'hex',
);

describe('parseInfo', () => {
	it('reads the fixed header, descriptor and string table layout', () => {
		const table = parseInfo(MINIMAL_INFO);

		expect(table.entries).toEqual([{ name: 'a', offset: 0, size: 4, flags: 0 }]);
	});

	it('resolves name pointers relative to the string table and keeps on-disk order', () => {
		const info = buildInfo([
			{ name: 'zeta', offset: 0, size: 16, flags: 1 },
			{ name: 'alpha', offset: 16, size: 8, flags: 0x80000000 },
			{ name: 'テクスチャ', offset: 24, size: 0, flags: 0xFFFFFFFF },
		]);

		const table = parseInfo(info);

		expect(table.entries).toEqual([
			{ name: 'zeta', offset: 0, size: 16, flags: 1 },
			{ name: 'alpha', offset: 16, size: 8, flags: 0x80000000 },
			{ name: 'テクスチャ', offset: 24, size: 0, flags: 0xFFFFFFFF },
		]);
	});

	it('parses an empty table', () => {
		expect(parseInfo(Buffer.from('00000000', 'hex')).length).toBe(0);
	});

	it('fails with TRUNCATED_INFO when the header is cut short', async () => {
		const err = await caught(() => parseInfo(Buffer.from([1, 0, 0])));

		expect(err).toMatchObject({
			code: 'TRUNCATED_INFO',
			message: 'Info file ends early: the header needs 4 bytes, but the file is 3 bytes long.',
		});
	});

	it('fails with TRUNCATED_INFO when the declared count needs more descriptors than are present', async () => {
		const info = Buffer.from(MINIMAL_INFO);
		info.writeUInt32LE(2, 0);

		const err = await caught(() => parseInfo(info));

		expect(err).toMatchObject({
			code: 'TRUNCATED_INFO',
			message: 'Info file ends early: a table of 2 entries needs 36 bytes, but the file is 22 bytes long.',
		});
	});

	it('does not try to read a table for an absurd entry count', async () => {
		const err = await caught(() => parseInfo(Buffer.from('ffffffff', 'hex')));

		expect(err).toMatchObject({ code: 'TRUNCATED_INFO', replacements: { needed: 4 + 0xFFFFFFFF * 16 } });
	});

	it('fails with TRUNCATED_INFO when a name pointer leaves the file', async () => {
		const info = Buffer.from(MINIMAL_INFO);
		info.writeUInt32LE(10, 4);

		const err = await caught(() => parseInfo(info));

		expect(err).toMatchObject({
			code: 'TRUNCATED_INFO',
			message: 'Info file ends early: the name of entry 0 (at offset 30) needs 31 bytes, but the file is 22 bytes long.',
		});
	});

	it('fails with TRUNCATED_INFO when the last name has no terminator', async () => {
		const err = await caught(() => parseInfo(MINIMAL_INFO.subarray(0, 21)));

		expect(err).toMatchObject({ code: 'TRUNCATED_INFO', replacements: { what: 'the name of entry 0 (at offset 20)' } });
	});

	it('fails with ENCODING_ERROR for a name that is not UTF-8', async () => {
		const info = Buffer.from(MINIMAL_INFO);
		info[20] = 0xFF;

		const err = await caught(() => parseInfo(info));

		expect(err).toMatchObject({
			code: 'ENCODING_ERROR',
			message: 'Entry 0 ("ff") cannot be encoded: name is not valid UTF-8.',
		});
	});

	it('fails with MALFORMED_TABLE when two descriptors share a name', async () => {
		const info = buildInfo([
			{ name: 'x', offset: 0, size: 1, flags: 0 },
			{ name: 'y', offset: 1, size: 1, flags: 0 },
		]);
		info.writeUInt32LE(0, 4 + 16); // second name pointer -> "x"

		const err = await caught(() => parseInfo(info));

		expect(err).toMatchObject({ code: 'MALFORMED_TABLE', replacements: { index: 1, name: 'x' } });
	});
});

describe('serializeInfo', () => {
	it('writes the minimal table byte for byte', () => {
		const table = new EntryTable([{ name: 'a', offset: 0, size: 4, flags: 0 }]);

		expect(serializeInfo(table).toString('hex')).toBe(MINIMAL_INFO.toString('hex'));
	});

	it('writes names in entry order and points each descriptor at its own copy', () => {
		const descriptors = [
			{ name: 'tex_title', offset: 0, size: 300, flags: 1 },
			{ name: 'tex_menu', offset: 300, size: 12, flags: 0 },
			{ name: 'tex_title_2', offset: 312, size: 5, flags: 1 },
		];

		const info = serializeInfo(new EntryTable(descriptors));

		expect(info.equals(buildInfo(descriptors))).toBe(true);
		expect(info.readUInt32LE(4 + 16)).toBe('tex_title\0'.length);
		expect(info.readUInt32LE(4 + 32)).toBe('tex_title\0tex_menu\0'.length);
	});

	it('is deterministic and matches infoLength', () => {
		const table = new EntryTable([
			{ name: 'é', offset: 0, size: 1, flags: 3 },
			{ name: 'b', offset: 1, size: 2, flags: 4 },
		]);

		const first = serializeInfo(table);
		const second = serializeInfo(table);

		expect(first.equals(second)).toBe(true);
		expect(first.length).toBe(infoLength(table));
		expect(infoLength(table)).toBe(4 + 2 * 16 + 3 + 2);
	});

	it('round-trips through parseInfo', () => {
		const table = new EntryTable([
			{ name: 'b', offset: 0, size: 1, flags: 9 },
			{ name: 'a', offset: 1, size: 0, flags: 0 },
		]);

		expect(parseInfo(serializeInfo(table)).entries).toEqual(table.entries);
	});

	it('accepts a name of exactly 255 bytes and rejects 256 with NAME_TOO_LONG', async () => {
		expect(() => serializeInfo(new EntryTable([{ name: 'a'.repeat(255), offset: 0, size: 0, flags: 0 }]))).not.toThrow();

		const err = await caught(() => serializeInfo(new EntryTable([{ name: 'é'.repeat(128), offset: 0, size: 0, flags: 0 }])));

		expect(err).toMatchObject({ code: 'NAME_TOO_LONG', replacements: { index: 0, length: 256, max: 255 } });
	});

	it.each([
		['', 'name is empty'],
		['a/b', 'name contains a path separator'],
		['a\\b', 'name contains a path separator'],
		['a\0b', 'name contains a NUL character'],
		['..', 'name is reserved'],
		['a\uD800', 'name contains an unpaired surrogate'],
	])('rejects the name %j with ENCODING_ERROR', async (name, reason) => {
		const err = await caught(() => serializeInfo(new EntryTable([{ name, offset: 0, size: 0, flags: 0 }])));

		expect(err).toMatchObject({ code: 'ENCODING_ERROR', replacements: { index: 0, reason } });
	});

	it('rejects values that do not fit in 32 bits with ENCODING_ERROR', async () => {
		const err = await caught(() => serializeInfo(new EntryTable([{ name: 'a', offset: 0, size: 0, flags: 2 ** 32 }])));

		expect(err).toMatchObject({
			code: 'ENCODING_ERROR',
			message: 'Entry 0 ("a") cannot be encoded: flags 4294967296 does not fit in 32 bits.',
		});
	});
});
