import { promises as fsP } from 'fs';
import os from 'os';
import path from 'path';

import type { PayloadSource, ManifestTarget } from '../src/manifest-bridge.js';

export interface Descriptor {
	name: string;
	offset: number;
	size: number;
	flags: number;
}

/** Info file bytes laid out by hand: count, 16-byte descriptors, then the NUL-terminated names. */
export function buildInfo(descriptors: Descriptor[]) {
	const table = Buffer.alloc(4 + descriptors.length * 16);
	table.writeUInt32LE(descriptors.length, 0);

	const names: Buffer[] = [];
	let namePointer = 0;
	for (const [index, descriptor] of descriptors.entries()) {
		const base = 4 + index * 16;
		table.writeUInt32LE(namePointer, base);
		table.writeUInt32LE(descriptor.offset, base + 4);
		table.writeUInt32LE(descriptor.flags, base + 8);
		table.writeUInt32LE(descriptor.size, base + 12);

		const name = Buffer.from(descriptor.name + '\0', 'utf8');
		names.push(name);
		namePointer += name.length;
	}

	return Buffer.concat([table, ...names]);
}

export class MemoryStore implements PayloadSource, ManifestTarget {
	readonly files = new Map<string, Buffer>();
	readonly written: string[] = [];
	document?: string;

	locate(file: string) {
		return `memory:${file}`;
	}

	async readPayload(file: string) {
		return this.files.get(file);
	}

	async writePayload(file: string, bytes: Buffer) {
		this.written.push(file);
		this.files.set(file, Buffer.from(bytes));
	}

	async writeManifest(document: string) {
		this.written.push('<manifest>');
		this.document = document;
	}
}

export async function makeTempDir() {
	return fsP.mkdtemp(path.join(os.tmpdir(), 'texarc-test-'));
}

export async function exists(filePath: string) {
	return fsP.access(filePath).then(() => true, () => false);
}

/** Runs `action` and returns what it threw, failing if it did not throw. */
export async function caught(action: () => unknown) {
	try {
		await action();
	} catch (err: unknown) {
		return err;
	}

	throw new Error('Expected an error to be thrown.');
}
