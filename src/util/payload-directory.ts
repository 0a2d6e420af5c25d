import { promises as fsP } from 'fs';
import path from 'path';

import { deleteAsync } from 'del';

import { NonFatalError } from '../errors.js';

import { mkdirIfDoesNotExist } from './mkdir-if-does-not-exist.js';

import type { PayloadSink, PayloadSource } from '../manifest-bridge.js';

const isMissingFileError = (err: unknown) => err instanceof Error && 'code' in err && err.code === 'ENOENT';

/** Payload files of one archive, stored flat in a single directory. */
export class PayloadDirectory implements PayloadSource, PayloadSink {
	constructor(
		readonly root: string,
	) {}

	locate(file: string) {
		return path.join(this.root, file);
	}

	async readPayload(file: string) {
		try {
			return await fsP.readFile(this.locate(file));
		} catch (err: unknown) {
			if (isMissingFileError(err)) return undefined;
			throw err;
		}
	}

	async writePayload(file: string, bytes: Buffer) {
		await fsP.writeFile(this.locate(file), bytes);
	}

	/**
	 * Creates the directory. An existing one must be empty unless `clean` is set, in which case
	 * its contents are deleted first.
	 */
	async prepare(clean: boolean) {
		const existing = await fsP.readdir(this.root).catch((err: unknown) => {
			if (isMissingFileError(err)) return [];
			throw err;
		});

		if (existing.length > 0) {
			if (!clean) throw new NonFatalError('OUTPUT_NOT_EMPTY', { path: this.root });
			// `cwd` is used as is; a pattern would read parentheses and braces in the path as glob syntax
			await deleteAsync('*', { cwd: this.root, dot: true });
		}

		await mkdirIfDoesNotExist(this.root);
	}
}
