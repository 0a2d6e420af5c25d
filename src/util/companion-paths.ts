import path from 'path';

import { NonFatalError } from '../errors.js';

export const DATA_ENDING = '.bin';
export const INFO_ENDING = '_info.bin';
export const MANIFEST_ENDING = '_tex.json';

/** Swaps `oldEnding` for `newEnding` in the file name, or appends `newEnding` if it has no such ending. */
export function siblingPath(input: string, oldEnding: string, newEnding: string) {
	const { dir, base } = path.parse(input);
	const stem = base.endsWith(oldEnding) ? base.slice(0, base.length - oldEnding.length) : base;
	return path.join(dir, stem + newEnding);
}

export const isDataFileName = (name: string) => name.endsWith(DATA_ENDING) && !name.endsWith(INFO_ENDING);
export const isManifestFileName = (name: string) => name.endsWith(MANIFEST_ENDING);

export interface ExtractPaths {
	data: string;
	info: string;
	manifest: string;
	payloadDirectory: string;
}

/**
 * `EUR_en.bin` reads `EUR_en_info.bin` and writes `EUR_en_tex.json` plus payloads into `EUR_en_tex/`.
 * An explicit manifest path moves the payload directory along with it.
 */
export function extractPaths(data: string, manifest?: string): ExtractPaths {
	if (typeof manifest === 'string' && !manifest.endsWith('.json')) {
		throw new NonFatalError('FILE_UNEXPECTED_EXTENSION', { path: manifest, extension: 'json' });
	}

	return {
		data,
		info: siblingPath(data, DATA_ENDING, INFO_ENDING),
		manifest: manifest ?? siblingPath(data, DATA_ENDING, MANIFEST_ENDING),
		payloadDirectory: typeof manifest === 'string'
			? siblingPath(manifest, '.json', '')
			: siblingPath(data, DATA_ENDING, '_tex'),
	};
}

export interface RebuildPaths {
	manifest: string;
	data: string;
	info: string;
}

/** `EUR_en_tex.json` rebuilds into `EUR_en.bin` and `EUR_en_info.bin`. */
export function rebuildPaths(manifest: string, data?: string): RebuildPaths {
	if (typeof data === 'string' && !isDataFileName(path.basename(data))) {
		throw new NonFatalError('FILE_UNEXPECTED_EXTENSION', { path: data, extension: 'bin' });
	}

	data ??= manifest.endsWith(MANIFEST_ENDING)
		? siblingPath(manifest, MANIFEST_ENDING, DATA_ENDING)
		: siblingPath(manifest, '.json', DATA_ENDING);

	return {
		manifest,
		data,
		info: siblingPath(data, DATA_ENDING, INFO_ENDING),
	};
}
