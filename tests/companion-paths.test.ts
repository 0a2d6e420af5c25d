import path from 'path';

import { describe, expect, it } from 'vitest';

import { extractPaths, isDataFileName, rebuildPaths, siblingPath } from '../src/util/companion-paths.js';

import { caught } from './helpers.js';

const p = (...segments: string[]) => path.join('archives', ...segments);

describe('siblingPath', () => {
	it('swaps a matching ending', () => {
		expect(siblingPath(p('EUR_en.bin'), '.bin', '_info.bin')).toBe(p('EUR_en_info.bin'));
	});

	it('appends when the ending does not match', () => {
		expect(siblingPath(p('EUR_en'), '.bin', '_tex')).toBe(p('EUR_en_tex'));
	});
});

describe('isDataFileName', () => {
	it('takes data files but not their info companions', () => {
		expect(isDataFileName('EUR_en.bin')).toBe(true);
		expect(isDataFileName('EUR_en_info.bin')).toBe(false);
		expect(isDataFileName('EUR_en_tex.json')).toBe(false);
	});
});

describe('extractPaths', () => {
	it('derives every companion from the data file', () => {
		expect(extractPaths(p('EUR_de.bin'))).toEqual({
			data: p('EUR_de.bin'),
			info: p('EUR_de_info.bin'),
			manifest: p('EUR_de_tex.json'),
			payloadDirectory: p('EUR_de_tex'),
		});
	});

	it('puts the payload directory beside an explicit manifest', () => {
		expect(extractPaths(p('EUR_de.bin'), p('out', 'german.json'))).toMatchObject({
			manifest: p('out', 'german.json'),
			payloadDirectory: p('out', 'german'),
		});
	});

	it('requires an explicit manifest to end on .json', async () => {
		const err = await caught(() => extractPaths(p('EUR_de.bin'), p('german.yaml')));

		expect(err).toMatchObject({ code: 'FILE_UNEXPECTED_EXTENSION', replacements: { extension: 'json' } });
	});
});

describe('rebuildPaths', () => {
	it('derives the data and info files from the manifest', () => {
		expect(rebuildPaths(p('EUR_it_tex.json'))).toEqual({
			manifest: p('EUR_it_tex.json'),
			data: p('EUR_it.bin'),
			info: p('EUR_it_info.bin'),
		});
	});

	it('swaps .json for .bin on other manifest names', () => {
		expect(rebuildPaths(p('custom.json')).data).toBe(p('custom.bin'));
	});

	it('places the info file beside an explicit data file', () => {
		expect(rebuildPaths(p('EUR_it_tex.json'), p('out', 'EUR_it.bin')).info).toBe(p('out', 'EUR_it_info.bin'));
	});

	it('rejects an explicit data file that could not have an info companion', async () => {
		const err = await caught(() => rebuildPaths(p('EUR_it_tex.json'), p('out', 'EUR_it_info.bin')));

		expect(err).toMatchObject({ code: 'FILE_UNEXPECTED_EXTENSION', replacements: { extension: 'bin' } });
	});
});
