import { promises as fsP } from 'fs';
import path from 'path';

import { deleteSync } from 'del';
import { onExit } from 'signal-exit';
import uniqueString from 'unique-string';

import { NonFatalError } from '../errors.js';

const stagedPaths = new Set<string>();
let cancelSignalExit: (() => void) | undefined;

const deleteStagedFiles = () => {
	for (const stagedPath of stagedPaths) {
		try {
			// staged file names are plain hex, never glob syntax
			deleteSync(path.basename(stagedPath), { cwd: path.dirname(stagedPath) });
		} catch {
			throw new NonFatalError('TEMP_FILE_DELETE_FAILED', { path: stagedPath });
		}
		stagedPaths.delete(stagedPath);
	}
};

/**
 * Output files are written in full under a temporary name in their destination's directory, then
 * renamed over the destination. Staged files that were never moved into place are deleted on exit.
 */
export const tempManager = {
	async stage(destination: string, bytes: Buffer) {
		cancelSignalExit ??= onExit(() => {
			deleteStagedFiles();
		});

		const stagedPath = path.join(path.dirname(destination), `texarc_${uniqueString()}.tmp`);
		stagedPaths.add(stagedPath);
		await fsP.writeFile(stagedPath, bytes);
		return stagedPath;
	},

	async commit(stagedPath: string, destination: string) {
		await fsP.rename(stagedPath, destination);
		stagedPaths.delete(stagedPath);
	},

	deleteStaged() {
		cancelSignalExit?.();
		cancelSignalExit = undefined;
		deleteStagedFiles();
	},
};
