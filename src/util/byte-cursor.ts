export class ReadBuffer {
	private internalOffset = 0;

	constructor(
		private readonly buffer: Buffer,
	) {}

	get totalSize() {
		return this.buffer.length;
	}

	canRead(numBytes: number, position = this.internalOffset) {
		return position >= 0 && position + numBytes <= this.buffer.length;
	}

	////////////////
	// READ METHODS

	readBuffer(numBytes: number) {
		if (!this.canRead(numBytes)) throw new RangeError('Read out of bounds.');

		const bytes = this.buffer.subarray(this.internalOffset, this.internalOffset + numBytes);
		this.internalOffset += numBytes;
		return bytes;
	}

	readUInt32() {
		return this.readBuffer(4).readUInt32LE();
	}

	/**
	 * Bytes from `position` up to, not including, the next NUL. Does not move the cursor.
	 * Returns `undefined` if `position` is out of range or no NUL follows it.
	 */
	peekTerminated(position: number) {
		if (!this.canRead(1, position)) return undefined;

		const end = this.buffer.indexOf(0, position);
		if (end === -1) return undefined;

		return this.buffer.subarray(position, end);
	}
}

export class WriteBuffer {
	private readonly chunks: Buffer[] = [];
	private internalOffset = 0;

	get bytesWritten() {
		return this.internalOffset;
	}

	toBuffer() {
		return Buffer.concat(this.chunks, this.internalOffset);
	}

	/////////////////
	// WRITE METHODS

	writeBuffer(buffer: Buffer) {
		if (buffer.length === 0) return;

		this.chunks.push(buffer);
		this.internalOffset += buffer.length;
	}

	writeZeros(numBytes: number) {
		if (numBytes > 0) this.writeBuffer(Buffer.alloc(numBytes));
	}

	writeUInt8(value: number) {
		const buffer = Buffer.allocUnsafe(1);
		buffer.writeUInt8(value);
		this.writeBuffer(buffer);
	}

	writeUInt32(value: number) {
		const buffer = Buffer.allocUnsafe(4);
		buffer.writeUInt32LE(value);
		this.writeBuffer(buffer);
	}

	writeChar8Terminated(bytes: Buffer) {
		this.writeBuffer(bytes);
		this.writeUInt8(0);
	}
}
