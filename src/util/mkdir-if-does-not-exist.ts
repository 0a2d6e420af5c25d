import fs, { promises as fsP } from 'fs';

import { NonFatalError } from '../errors.js';

export async function mkdirIfDoesNotExist(directoryPath: string) {
	try {
		await fsP.access(directoryPath, fs.constants.F_OK);
	} catch {
		// parents may not exist either
		await fsP.mkdir(directoryPath, { recursive: true });
		return;
	}

	await fsP.access(directoryPath, fs.constants.W_OK)
		.catch(() => { throw new NonFatalError('NO_WRITE_PERMISSIONS_PATH', { path: directoryPath }) });
}
