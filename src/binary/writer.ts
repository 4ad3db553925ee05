/**
 * Growable, seekable output sink.
 *
 * Size fields are written as placeholders, the payload follows, then the
 * writer seeks back to patch the real size. Seeking past the current end
 * and writing leaves the gap zero-filled.
 */
export type ByteWriter = {
	readonly tell: () => number;
	readonly seek: (offset: number) => void;
	/** Reserve `count` bytes at the cursor and return their offset. */
	readonly take: (count: number) => number;
	/** Backing buffer; re-read after every `take`, which may reallocate. */
	readonly buffer: () => Buffer;
	readonly write: (bytes: Uint8Array) => void;
	readonly u8: (value: number) => void;
	readonly zeros: (count: number) => void;
	/** Pad with zeros until `tell() - start` is a multiple of `alignment`. */
	readonly align: (alignment: number, start?: number) => number;
	readonly length: () => number;
	readonly toBuffer: () => Buffer;
};

const INITIAL_CAPACITY = 4096;

export const createByteWriter = (capacity = INITIAL_CAPACITY): ByteWriter => {
	let buf = Buffer.alloc(Math.max(16, capacity));
	let position = 0;
	let end = 0;

	const ensure = (needed: number): void => {
		if (needed <= buf.length) return;
		let size = buf.length * 2;
		while (size < needed) size *= 2;
		const grown = Buffer.alloc(size);
		buf.copy(grown, 0, 0, end);
		buf = grown;
	};

	const take = (count: number): number => {
		ensure(position + count);
		const start = position;
		position += count;
		if (position > end) end = position;
		return start;
	};

	const zeros = (count: number): void => {
		if (count <= 0) return;
		const start = take(count);
		buf.fill(0, start, start + count);
	};

	return {
		tell: () => position,
		seek: (offset: number) => {
			position = offset;
		},
		take,
		buffer: () => buf,
		write: (bytes: Uint8Array) => {
			const start = take(bytes.length);
			buf.set(bytes, start);
		},
		u8: (value: number) => {
			const offset = take(1);
			buf.writeUInt8(value & 0xff, offset);
		},
		zeros,
		align: (alignment: number, start = 0) => {
			const misalign = (position - start) % alignment;
			const padding = misalign === 0 ? 0 : alignment - misalign;
			zeros(padding);
			return padding;
		},
		length: () => end,
		toBuffer: () => Buffer.from(buf.subarray(0, end)),
	};
};
