import path from 'path';

import { Command, InvalidArgumentError } from 'commander';

import { isSupportedAlignment, MAX_ALIGNMENT, writeAll } from './data-block-codec.js';
import { NonFatalError } from './errors.js';
import { serializeInfo } from './info-codec.js';
import { fromManifest, parseManifest } from './manifest-bridge.js';

import { tempManager } from './managers/temp-manager.js';

import { isManifestFileName, rebuildPaths } from './util/companion-paths.js';
import { PayloadDirectory } from './util/payload-directory.js';
import { ProgressLogger } from './util/progress-logger.js';
import { checkDestination, readSourceFile, resolveSources } from './util/resolve-path-arguments.js';
import { log, logWarning } from './util/wrapped-log.js';

import type { EntryTable } from './entry-table.js';
import type { PayloadSource, SizeMismatch } from './manifest-bridge.js';
import type { ManifestFile } from './types/archive.js';

export interface RebuiltArchive {
	info: Buffer;
	data: Buffer;
	table: EntryTable;
	sizeMismatches: SizeMismatch[];
}

/**
 * Lays the manifest's payloads out anew and serializes both files. Nothing is written: the caller
 * gets both buffers, fully built, or an error.
 */
export async function rebuild(manifest: ManifestFile, source: PayloadSource, alignment = manifest.alignment): Promise<RebuiltArchive> {
	const { payloads, sizeMismatches } = await fromManifest(manifest, source);
	const { data, table } = writeAll(payloads, alignment);
	table.validate(data.length);

	return {
		info: serializeInfo(table),
		data,
		table,
		sizeMismatches,
	};
}

const parseAlignment = (value: string) => {
	const alignment = Number(value);
	if (!isSupportedAlignment(alignment)) throw new InvalidArgumentError(`Must be a power of two between 1 and ${MAX_ALIGNMENT}.`);
	return alignment;
};

type Settings = {
	output?: string;
	alignment?: number;
	verbose?: boolean;
};

export class ArchiveBuilder {
	static createCommand() {
		return new Command('rebuild')
			.argument('<source>')
			.description('rebuild one or more archives from their manifests (NAME_tex.json) and payload files')
			.option('-o, --output <data>', 'data file path, only for a single source; the info file goes beside it (default: NAME.bin beside the manifest)')
			.option('-a, --alignment <bytes>', 'payload alignment, overriding the one in the manifest', parseAlignment)
			.option('-v, --verbose', 'verbose output')
			.action(async (source: string, settings: Settings) => {
				const sources = await resolveSources(source, isManifestFileName, '_tex.json');

				const builder = new ArchiveBuilder(settings);
				await builder.run(sources);
			});
	}

	constructor(
		private readonly settings: Settings,
	) {}

	async run(sources: string[]) {
		if (sources.length > 1 && typeof this.settings.output === 'string') throw new NonFatalError('OUTPUT_WITH_MULTIPLE_SOURCES', { type: 'manifest' });

		if (this.settings.verbose) console.time('Duration');

		for (const source of sources) await this.rebuildArchive(source);

		if (this.settings.verbose) console.timeEnd('Duration');
	}

	private async rebuildArchive(source: string) {
		const output = typeof this.settings.output === 'string' ? path.resolve(this.settings.output) : undefined;
		const paths = rebuildPaths(source, output);
		await checkDestination(paths.data);

		const manifest = parseManifest(await this.readFromJSON(paths.manifest), paths.manifest);
		const directory = new PayloadDirectory(path.resolve(path.dirname(paths.manifest), manifest.payloadDirectory));

		const progressLogger = this.settings.verbose ? new ProgressLogger(manifest.entries.length, path.basename(paths.manifest)) : undefined;
		const archive = await rebuild(manifest, {
			locate: file => directory.locate(file),
			async readPayload(file) {
				const bytes = await directory.readPayload(file);
				progressLogger?.tick();
				return bytes;
			},
		}, this.settings.alignment);

		for (const mismatch of archive.sizeMismatches) {
			logWarning('Entry %d ("%s") is recorded as %d bytes, but its payload file has %d; using the payload file.', mismatch.index, mismatch.name, mismatch.recorded, mismatch.actual);
		}

		// both files are complete on disk before either destination is replaced
		try {
			const stagedData = await tempManager.stage(paths.data, archive.data);
			const stagedInfo = await tempManager.stage(paths.info, archive.info);
			await tempManager.commit(stagedData, paths.data);
			await tempManager.commit(stagedInfo, paths.info);
		} finally {
			tempManager.deleteStaged();
		}

		log('Rebuilt %d entries from "%s" into "%s" and "%s".', archive.table.length, paths.manifest, paths.data, paths.info);
	}

	private async readFromJSON(filePath: string) {
		const text = (await readSourceFile(filePath)).toString('utf8');
		try {
			const json: unknown = JSON.parse(text);
			return json;
		} catch (err: unknown) {
			if (err instanceof SyntaxError) throw new NonFatalError('JSON_INVALID', { path: filePath, type: 'manifest', reason: err.message });
			throw err;
		}
	}
}
