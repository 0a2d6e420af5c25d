import fs, { promises as fsP } from 'fs';
import path from 'path';

import { NonFatalError } from '../errors.js';

export async function checkPath(pathArg: string, type: 'source' | 'destination') {
	await fsP.access(pathArg, fs.constants.F_OK).catch(() => {
		throw new NonFatalError('PATH_DOES_NOT_EXIST', { type });
	});

	if (type === 'source') {
		await fsP.access(pathArg, fs.constants.R_OK).catch(() => {
			throw new NonFatalError('NO_READ_PERMISSIONS_TYPE', { type });
		});
	} else {
		if (!(await fsP.stat(pathArg)).isDirectory()) throw new NonFatalError('DESTINATION_INVALID', {});

		await fsP.access(pathArg, fs.constants.W_OK).catch(() => {
			throw new NonFatalError('NO_WRITE_PERMISSIONS_TYPE', { type });
		});
	}
}

/**
 * Resolves the source argument of a command to the files it should process: the file itself, or
 * the matching files directly inside a directory, sorted by name.
 */
export async function resolveSources(source: string, matches: (name: string) => boolean, description: string) {
	source = path.resolve(source);
	await checkPath(source, 'source');

	const sourceEntry = await fsP.stat(source);
	if (sourceEntry.isFile() && matches(path.basename(source))) return [source];

	if (sourceEntry.isDirectory()) {
		const files = (await fsP.readdir(source, { withFileTypes: true }))
			.filter(entry => entry.isFile() && matches(entry.name))
			.map(entry => path.join(source, entry.name))
			.sort();

		if (files.length > 0) return files;
	}

	throw new NonFatalError('SOURCE_INVALID', { description });
}

/** Checks that the directory an output file goes into exists and is writable. */
export async function checkDestination(filePath: string) {
	await checkPath(path.dirname(path.resolve(filePath)), 'destination');
}

export async function readSourceFile(filePath: string) {
	await fsP.access(filePath, fs.constants.R_OK)
		.catch(() => { throw new NonFatalError('NO_READ_PERMISSIONS_PATH', { path: filePath }) });

	return fsP.readFile(filePath);
}
