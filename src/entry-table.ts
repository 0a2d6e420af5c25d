import { NonFatalError } from './errors.js';

import type { Entry } from './types/archive.js';

const isExtent = (value: number) => Number.isSafeInteger(value) && value >= 0;

/**
 * Ordered entry descriptors of one archive. Immutable: rebuilding always produces a whole new
 * table rather than patching an existing one.
 */
export class EntryTable implements Iterable<Entry> {
	readonly entries: readonly Entry[];

	constructor(entries: Iterable<Entry>) {
		this.entries = Object.freeze(Array.from(entries, entry => Object.freeze({ ...entry })));
	}

	get length() {
		return this.entries.length;
	}

	get names() {
		return this.entries.map(entry => entry.name);
	}

	/** End of the furthest extent, i.e. the smallest data file length that holds every entry. */
	get dataEnd() {
		let end = 0;
		for (const entry of this.entries) end = Math.max(end, entry.offset + entry.size);
		return end;
	}

	[Symbol.iterator]() {
		return this.entries[Symbol.iterator]();
	}

	/**
	 * Checks name uniqueness, offset order and extents, throwing `MALFORMED_TABLE` for the first
	 * offending entry. Extents are only checked against `dataLength` when it is given.
	 */
	validate(dataLength?: number) {
		const seen = new Set<string>();
		let previousOffset = 0;
		let occupiedUntil = 0;

		for (const [index, entry] of this.entries.entries()) {
			const malformed = (reason: string) => new NonFatalError('MALFORMED_TABLE', { index, name: entry.name, reason });

			if (!isExtent(entry.offset)) throw malformed(`offset ${entry.offset} is not a non-negative integer`);
			if (!isExtent(entry.size)) throw malformed(`size ${entry.size} is not a non-negative integer`);
			if (seen.has(entry.name)) throw malformed('an earlier entry has the same name');
			if (entry.offset < previousOffset) throw malformed(`offset ${entry.offset} is lower than the previous entry's offset ${previousOffset}`);

			const end = entry.offset + entry.size;
			// empty extents cannot overlap anything
			if (entry.size > 0 && entry.offset < occupiedUntil) throw malformed(`bytes ${entry.offset} to ${end} overlap an earlier entry ending at ${occupiedUntil}`);
			if (dataLength !== undefined && end > dataLength) throw malformed(`extent ends at ${end}, past the data length ${dataLength}`);

			seen.add(entry.name);
			previousOffset = entry.offset;
			if (entry.size > 0) occupiedUntil = Math.max(occupiedUntil, end);
		}

		return this;
	}

	lookup(name: string) {
		const entry = this.entries.find(candidate => candidate.name === name);
		if (!entry) throw new NonFatalError('NOT_FOUND', { name });

		return entry;
	}
}
