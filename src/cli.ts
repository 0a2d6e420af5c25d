#!/usr/bin/env node
import cliCursor from 'cli-cursor';
import { program } from 'commander';

import { CustomError } from './errors.js';

import { tempManager } from './managers/temp-manager.js';

import { ArchiveExtractor } from './archive-extractor.js';
import { ArchiveBuilder } from './archive-builder.js';

import { logError } from './util/wrapped-log.js';

cliCursor.hide(process.stdout);

program
	.name('texarc')
	.description('extract and rebuild paired texture archives (NAME.bin + NAME_info.bin)')
	.addHelpCommand(false)
	.addCommand(ArchiveExtractor.createCommand())
	.addCommand(ArchiveBuilder.createCommand());

try {
	await program.parseAsync();
} catch (err: unknown) {
	if (err instanceof CustomError) {
		logError(err.message);
	} else {
		console.error(err);
	}
	process.exitCode = 1;
} finally {
	tempManager.deleteStaged();
}
