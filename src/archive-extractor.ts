import fs, { promises as fsP } from 'fs';
import path from 'path';

import { Command } from 'commander';

import { detectAlignment, DEFAULT_ALIGNMENT, readAll } from './data-block-codec.js';
import { NonFatalError } from './errors.js';
import { parseInfo, serializeInfo } from './info-codec.js';
import { toManifest } from './manifest-bridge.js';

import { extractPaths, isDataFileName } from './util/companion-paths.js';
import { PayloadDirectory } from './util/payload-directory.js';
import { ProgressLogger } from './util/progress-logger.js';
import { checkDestination, readSourceFile, resolveSources } from './util/resolve-path-arguments.js';
import { log, logWarning } from './util/wrapped-log.js';

import type { EntryTable } from './entry-table.js';

export interface ExtractedArchive {
	table: EntryTable;
	payloads: Map<string, Buffer>;
	/** `undefined` when no supported alignment reproduces the data file. */
	alignment: number | undefined;
	/** Whether serializing `table` gives back the info file byte for byte. */
	infoReproducible: boolean;
}

export function extract(info: Buffer, data: Buffer): ExtractedArchive {
	const table = parseInfo(info).validate(data.length);
	const payloads = readAll(data, table);

	return {
		table,
		payloads,
		alignment: detectAlignment(table, data.length),
		infoReproducible: serializeInfo(table).equals(info),
	};
}

type Settings = {
	output?: string;
	extension: string;
	clean?: boolean;
	verbose?: boolean;
};

export class ArchiveExtractor {
	static createCommand() {
		return new Command('extract')
			.argument('<source>')
			.description('extract one or more archives (NAME.bin with NAME_info.bin beside it) into a manifest and payload files')
			.option('-o, --output <manifest>', 'manifest path, only for a single source (default: NAME_tex.json beside the data file)')
			.option('-x, --extension <extension>', 'extension appended to entry names to form payload file names', '.bcrez')
			.option('-c, --clean', 'delete the contents of a non-empty payload directory instead of aborting')
			.option('-v, --verbose', 'verbose output')
			.action(async (source: string, settings: Settings) => {
				const sources = await resolveSources(source, isDataFileName, '.bin');

				const extractor = new ArchiveExtractor(settings);
				await extractor.run(sources);
			});
	}

	constructor(
		private readonly settings: Settings,
	) {}

	async run(sources: string[]) {
		if (sources.length > 1 && typeof this.settings.output === 'string') throw new NonFatalError('OUTPUT_WITH_MULTIPLE_SOURCES', { type: 'data file' });

		if (this.settings.verbose) console.time('Duration');

		for (const source of sources) await this.extractArchive(source);

		if (this.settings.verbose) console.timeEnd('Duration');
	}

	private async extractArchive(source: string) {
		const output = typeof this.settings.output === 'string' ? path.resolve(this.settings.output) : undefined;
		const paths = extractPaths(source, output);

		await fsP.access(paths.info, fs.constants.F_OK)
			.catch(() => { throw new NonFatalError('COMPANION_MISSING', { path: paths.info }) });
		const info = await readSourceFile(paths.info);
		const data = await readSourceFile(paths.data);

		const archive = extract(info, data);
		if (archive.alignment === undefined) {
			logWarning('The payload layout of "%s" does not follow any supported alignment; a rebuild will pack payloads without padding and differ from the input file.', paths.data);
		}
		if (!archive.infoReproducible) {
			logWarning('The table of "%s" cannot be reproduced byte for byte (shared or reordered names); a rebuild will write an equivalent table with different bytes.', paths.info);
		}

		await checkDestination(paths.manifest);
		const directory = new PayloadDirectory(paths.payloadDirectory);
		await directory.prepare(this.settings.clean ?? false);

		const progressLogger = this.settings.verbose ? new ProgressLogger(archive.table.length, path.basename(paths.data)) : undefined;
		await toManifest(archive.table, archive.payloads, {
			async writePayload(file, bytes) {
				await directory.writePayload(file, bytes);
				progressLogger?.tick();
			},
			async writeManifest(document) {
				await fsP.writeFile(paths.manifest, document);
			},
		}, {
			alignment: archive.alignment ?? DEFAULT_ALIGNMENT,
			payloadDirectory: path.relative(path.dirname(paths.manifest), paths.payloadDirectory),
			extension: this.settings.extension,
		});

		log('Extracted %d entries from "%s" into "%s".', archive.table.length, paths.data, paths.manifest);
	}
}
